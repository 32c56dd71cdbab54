export * from './errors/timeline.error';
export * from './utils/error.util';
export * from './utils/format.util';
