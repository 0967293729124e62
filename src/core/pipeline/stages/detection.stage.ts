import { PipelineStage, WebhookContext } from '../types';
import { ProtocolAdapters } from '../../interfaces';
import { parseInboundWebhook } from '../inbound';

/**
 * Stage 1: Detection
 * Tags the raw payload with its transport and validates its wire shape
 */
export class DetectionStage implements PipelineStage {
  name = 'detection';

  constructor(private readonly adapters: ProtocolAdapters) {}

  execute(context: WebhookContext): void {
    context.inbound = parseInboundWebhook(context.raw, this.adapters);
  }
}
