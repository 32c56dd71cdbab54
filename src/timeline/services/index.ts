export * from './timeline-extractor.service';
