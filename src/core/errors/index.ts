export * from './adcp.errors';
