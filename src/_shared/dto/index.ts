/**
 * Centralized DTOs
 *
 * Wire shapes of inbound webhooks, AdCP task response models and the HTTP
 * response of the webhook endpoint.
 */

export * from './webhooks';
export * from './responses';
export * from './webhook.dto';
