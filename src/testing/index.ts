import 'reflect-metadata';

/**
 * Testing utilities
 * Webhook factories and signing helpers for exercising webhook receivers
 */

// Test factories and helpers
export * from '../_shared/testing/mock-webhook-factory';

// Sending-side builders
export * from '../adapters/protocols';

// Re-export core for convenience in tests
export * from '../core';
