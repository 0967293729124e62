import {
  DecodeOutcome,
  ExtractedPayload,
  InboundWebhook,
  LifecycleHooks,
  MappedStatus,
  ProtocolAdapters,
  WebhookLogger,
} from '../interfaces';
import { TaskResult } from '../domain/models';
import { ResponseTypeRegistry } from '../registry';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  raw: unknown;
  taskType: string;
  operationId: string;
  signature?: string;
  signatureTimestamp?: string;

  // Processing metadata
  processingId: string;

  // Detection
  inbound?: InboundWebhook;

  // Verification
  signatureVerified?: boolean;

  // Normalization
  mappedStatus?: MappedStatus;
  extracted?: ExtractedPayload;
  decoded?: DecodeOutcome<unknown>;
  candidateError?: string | null;

  // Outcome
  result?: TaskResult;
}

/**
 * Pipeline stage interface. Stages enrich the context in place and throw
 * to abort the delivery.
 */
export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): void;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig<M extends object> {
  // Collaborators
  registry: ResponseTypeRegistry<M>;
  adapters: ProtocolAdapters;

  // Signatures (MCP only)
  webhookSecret?: string | string[];
  requireSignature?: boolean;
  signatureToleranceSeconds?: number;
  now?: () => Date;

  // Lifecycle hooks
  hooks?: LifecycleHooks;

  logger?: WebhookLogger;
}

/**
 * Per-delivery inputs that travel outside the payload
 */
export interface HandleWebhookOptions {
  /**
   * X-AdCP-Signature header value (`sha256=<hex>` or bare hex)
   */
  signature?: string;

  /**
   * X-AdCP-Timestamp header value, when the sender bound one
   */
  timestamp?: string;
}

/**
 * Stage ran without the context a previous stage should have produced
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Read a context field a previous stage must have set
 */
export function requireContext<K extends keyof WebhookContext>(
  context: WebhookContext,
  key: K,
  stage: string,
): NonNullable<WebhookContext[K]> {
  const value = context[key];
  if (value === undefined || value === null) {
    throw new PipelineError(`Stage '${stage}' requires '${String(key)}'`, stage);
  }
  return value;
}
