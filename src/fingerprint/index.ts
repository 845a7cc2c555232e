export * from './fingerprint-service';
