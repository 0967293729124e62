import {
  PipelineStage,
  WebhookContext,
  requireContext,
} from '../types';
import { ProtocolAdapters } from '../../interfaces';
import { mapStatus } from '../../status';
import { readRawStatus } from '../inbound';

/**
 * Stage 3: Status Mapping
 * Translates the transport status into the canonical TaskStatus
 */
export class StatusStage implements PipelineStage {
  name = 'status';

  constructor(private readonly adapters: ProtocolAdapters) {}

  execute(context: WebhookContext): void {
    const inbound = requireContext(context, 'inbound', this.name);
    const value = readRawStatus(inbound, this.adapters);

    context.mappedStatus = {
      protocol: inbound.protocol,
      value,
      status: mapStatus(inbound.protocol, value),
    };
  }
}
