import { Protocol } from '../domain/enums';
import { JsonObject } from './common.types';

/**
 * MCP webhook body as posted by an agent
 */
export interface McpWebhookPayload {
  task_id: string;
  status: string;
  timestamp: string;
  task_type?: string;
  result?: JsonObject;
  operation_id?: string;
  message?: string;
  context_id?: string;
  domain?: string;
}

/**
 * Fragment of an A2A message or artifact.
 * `data` parts carry structured results, `text` parts human-readable text;
 * other kinds (file, ...) are ignored by extraction.
 */
export interface A2aPart {
  kind: string;
  data?: JsonObject;
  text?: string;
  metadata?: JsonObject;
}

export interface A2aMessage {
  message_id?: string;
  role?: string;
  parts: A2aPart[];
}

export interface A2aArtifact {
  artifact_id?: string;
  name?: string;
  parts: A2aPart[];
}

export interface A2aTaskStatus {
  state: string;
  timestamp?: string;
  message?: A2aMessage;
}

/**
 * A2A Task (terminal states) or TaskStatusUpdateEvent (in-progress states),
 * normalized so the task id is always `id`
 */
export interface A2aTaskPayload {
  id: string;
  context_id?: string;
  kind?: string;
  status: A2aTaskStatus;
  artifacts?: A2aArtifact[];
  final?: boolean;
  metadata?: JsonObject;
}

/**
 * Raw webhook after transport detection and shape validation
 */
export type InboundWebhook =
  | { protocol: Protocol.MCP; payload: McpWebhookPayload; raw: JsonObject }
  | { protocol: Protocol.A2A; payload: A2aTaskPayload; raw: JsonObject };
