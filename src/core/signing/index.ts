export * from './canonical-json';
export * from './signature';
