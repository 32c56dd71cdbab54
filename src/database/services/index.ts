export * from './location-database.service';
export * from './sample-database.service';
