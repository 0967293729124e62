/**
 * Centralized Swagger decorators
 *
 * These decorators keep API documentation out of the controllers.
 */

export * from './webhook.decorators';
export * from './health.decorators';
