/**
 * AdCP webhook core - transport detection, signature checks, status mapping
 * and typed result decoding. Framework-agnostic.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Errors
export * from './errors';

// Building blocks
export * from './signing';
export * from './status';
export * from './registry';
export * from './decoding';

// Webhook processing pipeline
export * from './pipeline';
