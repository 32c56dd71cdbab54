export * from './location-fix.interface';
export * from './stop.interface';
export * from './stop-detection-config.interface';
