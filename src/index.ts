/**
 * AdCP Webhooks
 *
 * Turns MCP and A2A task webhooks from AdCP agents into verified, typed,
 * transport-agnostic task results.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export protocol adapters and sending-side builders
export * from './adapters/protocols';

// Export DTOs, the default response registry and Swagger decorators
export * from './_shared/dto';
export * from './_shared/registry';
export * from './_shared/swagger/decorators';

// Export testing utilities from _shared
export {
  MockWebhookFactory,
  MOCK_TIMESTAMP,
} from './_shared/testing/mock-webhook-factory';
export type {
  WebhookOptions,
  MockWebhook,
} from './_shared/testing/mock-webhook-factory';

// Export format asset helpers
export * from './utils';

// Export NestJS module
export * from './modules';

// Export processor factory wired with the default registry
export { createWebhookProcessor } from './create-webhook-processor';
