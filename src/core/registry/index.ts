export * from './response-type.registry';
export * from './validation-issues';
