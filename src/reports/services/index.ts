export * from './timeline-csv.service';
export * from './map-html.service';
export * from './file-hash.service';
export * from './report-generator.service';
