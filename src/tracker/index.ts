export * from './tracker-service';
