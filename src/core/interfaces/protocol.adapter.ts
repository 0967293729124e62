import { Protocol, TaskStatus } from '../domain/enums';
import { ExtractedPayload, JsonObject } from './common.types';
import { A2aTaskPayload, McpWebhookPayload } from './webhook-payloads';

/**
 * Protocol adapter interface - abstracts transport-specific webhook shapes.
 * Each transport implementation validates its payload and knows where the
 * task result lives.
 */
export interface ProtocolAdapter<P> {
  readonly protocol: Protocol;

  /**
   * Validate the raw body against the transport's wire shape
   * @throws WebhookValidationError listing every violated constraint
   */
  parse(raw: JsonObject): P;

  getTaskId(payload: P): string;

  /**
   * Status string exactly as the transport reported it
   */
  getRawStatus(payload: P): string;

  /**
   * Pull the task result, status text, context id and timestamp out of
   * the payload. `status` is the already-mapped status of the payload.
   */
  extract(payload: P, status: TaskStatus): ExtractedPayload;
}

/**
 * One adapter per supported transport
 */
export interface ProtocolAdapters {
  [Protocol.MCP]: ProtocolAdapter<McpWebhookPayload>;
  [Protocol.A2A]: ProtocolAdapter<A2aTaskPayload>;
}
