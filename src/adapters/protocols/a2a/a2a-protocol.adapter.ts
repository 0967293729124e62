import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  A2aPart,
  A2aTaskPayload,
  ExtractedPayload,
  JsonObject,
  JsonValue,
  Protocol,
  ProtocolAdapter,
  TaskStatus,
  WebhookValidationError,
  flattenValidationErrors,
  isTerminalStatus,
} from '../../../core';
import { A2aTaskDto } from '../../../_shared/dto/webhooks';

/**
 * A2A Protocol Adapter
 *
 * Terminal states arrive as a Task whose result lives in `artifacts[].parts`;
 * in-progress states arrive as a TaskStatusUpdateEvent whose result lives in
 * `status.message.parts`, falling back to `artifacts[].parts` when the
 * status message has no parts. The first data part is the result, the first
 * text part the message.
 */
export class A2aProtocolAdapter implements ProtocolAdapter<A2aTaskPayload> {
  readonly protocol = Protocol.A2A;

  parse(raw: JsonObject): A2aTaskPayload {
    const payload = plainToInstance(A2aTaskDto, this.foldAliases(raw));
    const errors = validateSync(payload);

    if (errors.length > 0) {
      throw new WebhookValidationError(
        'Invalid A2A webhook payload',
        flattenValidationErrors(errors),
      );
    }

    return payload;
  }

  getTaskId(payload: A2aTaskPayload): string {
    return payload.id;
  }

  getRawStatus(payload: A2aTaskPayload): string {
    return payload.status.state;
  }

  extract(payload: A2aTaskPayload, status: TaskStatus): ExtractedPayload {
    const artifactParts = (payload.artifacts ?? []).flatMap((artifact) => artifact.parts);
    const messageParts = payload.status.message?.parts ?? [];

    // In-progress tasks sent as a full Task may carry their result in artifacts
    const parts = isTerminalStatus(status)
      ? artifactParts
      : messageParts.length > 0
        ? messageParts
        : artifactParts;

    return {
      result: this.firstData(parts),
      message: this.firstText(parts),
      contextId: payload.context_id ?? null,
      timestamp: payload.status.timestamp ?? null,
    };
  }

  /**
   * Status-update events carry `task_id` (or `taskId`) instead of `id`;
   * camelCase serializers emit `contextId`
   */
  private foldAliases(raw: JsonObject): JsonObject {
    const folded: JsonObject = { ...raw };

    const id = this.firstPresent(raw, ['id', 'task_id', 'taskId']);
    if (id !== undefined) {
      folded.id = id;
    }

    const contextId = this.firstPresent(raw, ['context_id', 'contextId']);
    if (contextId !== undefined) {
      folded.context_id = contextId;
    }

    return folded;
  }

  private firstPresent(raw: JsonObject, keys: string[]): JsonValue | undefined {
    for (const key of keys) {
      const value = raw[key];
      if (value !== undefined && value !== null) {
        return value;
      }
    }
    return undefined;
  }

  private firstData(parts: A2aPart[]): JsonObject | null {
    for (const part of parts) {
      if (part.kind === 'data' && part.data !== undefined) {
        return part.data;
      }
    }
    return null;
  }

  private firstText(parts: A2aPart[]): string | null {
    for (const part of parts) {
      if (part.kind === 'text' && part.text !== undefined) {
        return part.text;
      }
    }
    return null;
  }
}
