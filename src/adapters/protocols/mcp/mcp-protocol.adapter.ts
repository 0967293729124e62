import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  ExtractedPayload,
  JsonObject,
  McpWebhookPayload,
  Protocol,
  ProtocolAdapter,
  TaskStatus,
  WebhookValidationError,
  flattenValidationErrors,
} from '../../../core';
import { McpWebhookPayloadDto } from '../../../_shared/dto/webhooks';

/**
 * MCP Protocol Adapter
 *
 * MCP agents post a flat JSON object; the task result sits under `result`
 * regardless of status. Deliveries may be signed with HMAC-SHA256
 * (X-AdCP-Signature), which the pipeline checks before extraction.
 */
export class McpProtocolAdapter implements ProtocolAdapter<McpWebhookPayload> {
  readonly protocol = Protocol.MCP;

  parse(raw: JsonObject): McpWebhookPayload {
    const payload = plainToInstance(McpWebhookPayloadDto, raw);
    const errors = validateSync(payload);

    if (errors.length > 0) {
      throw new WebhookValidationError(
        'Invalid MCP webhook payload',
        flattenValidationErrors(errors),
      );
    }

    return payload;
  }

  getTaskId(payload: McpWebhookPayload): string {
    return payload.task_id;
  }

  getRawStatus(payload: McpWebhookPayload): string {
    return payload.status;
  }

  extract(payload: McpWebhookPayload, _status: TaskStatus): ExtractedPayload {
    return {
      result: payload.result ?? null,
      message: payload.message ?? null,
      contextId: payload.context_id ?? null,
      timestamp: payload.timestamp,
    };
  }
}
