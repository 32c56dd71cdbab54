export * from './location.entity';
