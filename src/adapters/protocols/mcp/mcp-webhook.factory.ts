import { JsonObject, TaskStatus, toWireStatus } from '../../../core';

export interface McpWebhookPayloadOptions {
  taskId: string;
  taskType: string;
  status: TaskStatus;
  /**
   * Defaults to the current time
   */
  timestamp?: Date | string;
  result?: JsonObject;
  /**
   * Kept for agents that still echo it; receivers take the operation id from
   * the webhook URL
   */
  operationId?: string;
  message?: string;
  contextId?: string;
  domain?: string;
}

/**
 * Build the JSON body an agent posts to an MCP webhook URL.
 * Optional fields are only present when given.
 */
export function createMcpWebhookPayload(options: McpWebhookPayloadOptions): JsonObject {
  const timestamp = options.timestamp ?? new Date();

  const payload: JsonObject = {
    task_id: options.taskId,
    task_type: options.taskType,
    status: toWireStatus(options.status),
    timestamp: timestamp instanceof Date ? timestamp.toISOString() : timestamp,
  };

  if (options.result !== undefined) {
    payload.result = options.result;
  }
  if (options.operationId !== undefined) {
    payload.operation_id = options.operationId;
  }
  if (options.message !== undefined) {
    payload.message = options.message;
  }
  if (options.contextId !== undefined) {
    payload.context_id = options.contextId;
  }
  if (options.domain !== undefined) {
    payload.domain = options.domain;
  }

  return payload;
}
