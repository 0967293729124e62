import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { LifecycleHooks } from '../../core';

/**
 * AdCP Module Configuration
 */
export interface AdcpModuleConfig {
  /**
   * Webhook receiving configuration
   */
  webhooks?: {
    /**
     * Shared secret(s) for MCP webhook signatures (X-AdCP-Signature).
     * An array supports key rotation: each secret is tried in turn.
     */
    secret?: string | string[];

    /**
     * Reject unsigned MCP webhooks
     */
    requireSignature?: boolean;

    /**
     * Maximum age of X-AdCP-Timestamp, in seconds. Unset disables the check.
     */
    signatureToleranceSeconds?: number;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;

  /**
   * API configuration
   */
  api?: {
    globalPrefix?: string;
    enableSwagger?: boolean;
  };

  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface AdcpModuleAsyncConfig
  extends Pick<FactoryProvider<AdcpModuleConfig>, 'useFactory' | 'inject'> {
  imports?: ModuleMetadata['imports'];
}

/**
 * Default configuration values
 */
export const defaultAdcpConfig: AdcpModuleConfig = {
  webhooks: {
    requireSignature: false,
  },
  api: {
    enableSwagger: true,
  },
  debug: false,
};

/**
 * Overlay a user configuration on the defaults, section by section
 */
export function mergeAdcpConfig(config: AdcpModuleConfig): AdcpModuleConfig {
  return {
    ...defaultAdcpConfig,
    ...config,
    webhooks: { ...defaultAdcpConfig.webhooks, ...config.webhooks },
    api: { ...defaultAdcpConfig.api, ...config.api },
  };
}
