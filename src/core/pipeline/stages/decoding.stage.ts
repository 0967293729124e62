import {
  PipelineStage,
  WebhookContext,
  requireContext,
} from '../types';
import { WebhookLogger } from '../../interfaces';
import { TypedResultDecoder } from '../../decoding';

/**
 * Stage 5: Decoding
 * Parses the result into the task type's response model, keeping the raw
 * object when the model rejects it
 */
export class DecodingStage<M extends object> implements PipelineStage {
  name = 'decoding';

  constructor(
    private readonly decoder: TypedResultDecoder<M>,
    private readonly logger: WebhookLogger,
  ) {}

  execute(context: WebhookContext): void {
    const { result } = requireContext(context, 'extracted', this.name);

    const decoded = this.decoder.decode(context.taskType, result);
    if (decoded.kind === 'raw') {
      this.logger.warn(
        `[${context.processingId}] ${context.taskType} result kept as raw data: ${decoded.issues.join('; ')}`,
      );
    }

    context.decoded = decoded;
    context.candidateError = this.decoder.extractFirstError(result);
  }
}
