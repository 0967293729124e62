export * from './default-response-registry';
