import {
  PipelineStage,
  WebhookContext,
  requireContext,
} from '../types';
import { Protocol } from '../../domain/enums';
import { WebhookLogger } from '../../interfaces';
import { WebhookSignatureError } from '../../errors';
import { verifySignature } from '../../signing';

export interface VerificationOptions {
  secrets: string[];
  requireSignature: boolean;
  toleranceSeconds?: number;
  now?: () => Date;
}

/**
 * Stage 2: Signature Verification (MCP only)
 * A2A deliveries are authenticated by the transport, so a signature passed
 * alongside one is ignored.
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(
    private readonly options: VerificationOptions,
    private readonly logger: WebhookLogger,
  ) {}

  execute(context: WebhookContext): void {
    const inbound = requireContext(context, 'inbound', this.name);
    context.signatureVerified = false;

    if (inbound.protocol === Protocol.A2A) {
      if (context.signature !== undefined) {
        this.logger.debug(
          `[${context.processingId}] Ignoring signature supplied with A2A payload`,
        );
      }
      return;
    }

    if (context.signature === undefined) {
      if (this.options.requireSignature) {
        throw new WebhookSignatureError('Missing webhook signature');
      }
      return;
    }

    verifySignature(inbound.raw, this.options.secrets, context.signature, {
      timestamp: context.signatureTimestamp,
      toleranceSeconds: this.options.toleranceSeconds,
      now: this.options.now,
    });
    context.signatureVerified = true;
  }
}
