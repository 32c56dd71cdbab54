export * from './csv.util';
export * from './html.util';
export * from './duration-band.util';
