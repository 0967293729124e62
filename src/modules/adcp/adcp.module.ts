import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  AdcpModuleConfig,
  AdcpModuleAsyncConfig,
  mergeAdcpConfig,
} from './adcp.config';
import {
  ProtocolAdapters,
  ResponseTypeRegistry,
  WebhookProcessor,
} from '../../core';
import { createProtocolAdapters } from '../../adapters/protocols';
import {
  AdcpResponseTypes,
  getDefaultResponseRegistry,
} from '../../_shared/registry';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { AdcpWebhookService } from './services/adcp-webhook.service';
import { ConfigurationService } from './services/configuration.service';
import {
  ADCP_CONFIG,
  ADCP_MODULE_OPTIONS,
  PROTOCOL_ADAPTERS,
  RESPONSE_TYPE_REGISTRY,
  WEBHOOK_PROCESSOR,
} from './constants';

/**
 * AdCP Module - Main NestJS Module
 *
 * Provides the webhook pipeline, its configuration and the webhook endpoint
 */
@Global()
@Module({})
export class AdcpModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: AdcpModuleConfig = {}): DynamicModule {
    return {
      module: AdcpModule,
      providers: [
        {
          provide: ADCP_CONFIG,
          useValue: mergeAdcpConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedProviders(),
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: AdcpModuleAsyncConfig): DynamicModule {
    return {
      module: AdcpModule,
      imports: options.imports || [],
      providers: [
        {
          provide: ADCP_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        {
          provide: ADCP_CONFIG,
          useFactory: (config: AdcpModuleConfig) => mergeAdcpConfig(config),
          inject: [ADCP_MODULE_OPTIONS],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedProviders(),
    };
  }

  /**
   * Providers that depend only on the merged configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: RESPONSE_TYPE_REGISTRY,
        useFactory: () => getDefaultResponseRegistry(),
      },
      {
        provide: PROTOCOL_ADAPTERS,
        useFactory: () => createProtocolAdapters(),
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          configuration: ConfigurationService,
          registry: ResponseTypeRegistry<AdcpResponseTypes>,
          adapters: ProtocolAdapters,
        ) =>
          new WebhookProcessor({
            registry,
            adapters,
            webhookSecret: configuration.getWebhookSecrets(),
            requireSignature: configuration.isSignatureRequired(),
            signatureToleranceSeconds: configuration.getSignatureToleranceSeconds(),
            hooks: configuration.getHooks(),
          }),
        inject: [ConfigurationService, RESPONSE_TYPE_REGISTRY, PROTOCOL_ADAPTERS],
      },
      ConfigurationService,
      AdcpWebhookService,
    ];
  }

  private static exportedProviders(): NonNullable<DynamicModule['exports']> {
    return [
      ADCP_CONFIG,
      RESPONSE_TYPE_REGISTRY,
      WEBHOOK_PROCESSOR,
      ConfigurationService,
      AdcpWebhookService,
    ];
  }
}
