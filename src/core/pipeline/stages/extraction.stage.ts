import {
  PipelineStage,
  WebhookContext,
  requireContext,
} from '../types';
import { ProtocolAdapters } from '../../interfaces';
import { extractPayload } from '../inbound';

/**
 * Stage 4: Extraction
 */
export class ExtractionStage implements PipelineStage {
  name = 'extraction';

  constructor(private readonly adapters: ProtocolAdapters) {}

  execute(context: WebhookContext): void {
    const inbound = requireContext(context, 'inbound', this.name);
    const { status } = requireContext(context, 'mappedStatus', this.name);

    context.extracted = extractPayload(inbound, status, this.adapters);
  }
}
