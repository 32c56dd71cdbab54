export * from './stop-detector.service';
