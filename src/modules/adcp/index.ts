/**
 * AdCP NestJS Module
 *
 * Main module for receiving AdCP webhooks in NestJS applications
 */

// Main module
export { AdcpModule } from './adcp.module';

// Configuration
export {
  AdcpModuleConfig,
  AdcpModuleAsyncConfig,
  defaultAdcpConfig,
  mergeAdcpConfig,
} from './adcp.config';

// Injection tokens
export * from './constants';

// Controllers
export { WebhookController } from './controllers/webhook.controller';
export { HealthController } from './controllers/health.controller';

// Services
export { AdcpWebhookService } from './services/adcp-webhook.service';
export { ConfigurationService } from './services/configuration.service';
