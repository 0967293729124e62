import { Injectable, Inject } from '@nestjs/common';
import type { AdcpModuleConfig } from '../adcp.config';
import type { LifecycleHooks } from '../../../core';
import { ADCP_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the merged AdCP module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(ADCP_CONFIG)
    private readonly config: AdcpModuleConfig,
  ) {}

  /**
   * Configured webhook secrets, empty when signatures cannot be checked
   */
  getWebhookSecrets(): string[] {
    const secret = this.config.webhooks?.secret;
    if (secret === undefined) {
      return [];
    }
    return (Array.isArray(secret) ? secret : [secret]).filter(Boolean);
  }

  /**
   * Check if unsigned MCP webhooks are rejected
   */
  isSignatureRequired(): boolean {
    return this.config.webhooks?.requireSignature === true;
  }

  getSignatureToleranceSeconds(): number | undefined {
    return this.config.webhooks?.signatureToleranceSeconds;
  }

  getHooks(): LifecycleHooks | undefined {
    return this.config.hooks;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }

  /**
   * Check if Swagger is enabled
   */
  isSwaggerEnabled(): boolean {
    return this.config.api?.enableSwagger !== false;
  }

  /**
   * Get global API prefix
   */
  getGlobalPrefix(): string | undefined {
    return this.config.api?.globalPrefix;
  }
}
