export * from './device-repository.interface';
