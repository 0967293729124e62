import { PipelineConfig, WebhookProcessor } from './core';
import { createProtocolAdapters } from './adapters/protocols';
import {
  AdcpResponseTypes,
  getDefaultResponseRegistry,
} from './_shared/registry';

/**
 * WebhookProcessor with both transports and the default task type registry.
 * Pass `registry` or `adapters` to replace either.
 */
export function createWebhookProcessor(
  config: Partial<PipelineConfig<AdcpResponseTypes>> = {},
): WebhookProcessor<AdcpResponseTypes> {
  return new WebhookProcessor({
    ...config,
    registry: config.registry ?? getDefaultResponseRegistry(),
    adapters: config.adapters ?? createProtocolAdapters(),
  });
}
