import {
  JsonObject,
  TaskStatus,
  isTerminalStatus,
  toWireStatus,
} from '../../../core';

export interface A2aWebhookPayloadOptions {
  taskId: string;
  status: TaskStatus;
  contextId: string;
  /**
   * Defaults to the current time
   */
  timestamp?: Date | string;
  result?: JsonObject;
  message?: string;
}

/**
 * Build an A2A webhook body.
 *
 * Completed and failed tasks are sent as a Task with the result in
 * `artifacts[0].parts`; every other status as a TaskStatusUpdateEvent with
 * the result in `status.message.parts` and `final: false`.
 */
export function createA2aWebhookPayload(options: A2aWebhookPayloadOptions): JsonObject {
  const timestamp = options.timestamp ?? new Date();

  const parts: JsonObject[] = [];
  if (options.result !== undefined) {
    parts.push({ kind: 'data', data: options.result });
  }
  if (options.message !== undefined) {
    parts.push({ kind: 'text', text: options.message });
  }

  const status: JsonObject = {
    state: toWireStatus(options.status),
    timestamp: timestamp instanceof Date ? timestamp.toISOString() : timestamp,
  };

  if (isTerminalStatus(options.status)) {
    return {
      kind: 'task',
      id: options.taskId,
      context_id: options.contextId,
      status,
      artifacts:
        parts.length > 0
          ? [{ artifact_id: `${options.taskId}_result`, parts }]
          : [],
    };
  }

  if (parts.length > 0) {
    status.message = {
      message_id: `${options.taskId}_msg`,
      role: 'agent',
      parts,
    };
  }

  return {
    kind: 'status-update',
    task_id: options.taskId,
    context_id: options.contextId,
    status,
    final: false,
  };
}
