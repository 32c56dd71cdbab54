export * from './extraction.interface';
