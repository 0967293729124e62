import { Protocol, TaskStatus } from '../domain/enums';

/**
 * Common types used across the normalization pipeline
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object (the only shape a task result may take)
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Narrow an unknown value to a plain (non-array) object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Transport-independent view of a webhook body
 */
export interface ExtractedPayload {
  result: JsonObject | null;
  message: string | null;
  contextId: string | null;
  timestamp: string | null;
}

/**
 * Outcome of decoding a task result against its response model.
 * `raw` keeps the original object when the model rejected it.
 */
export type DecodeOutcome<T> =
  | { kind: 'typed'; value: T }
  | { kind: 'raw'; value: JsonObject; issues: string[] }
  | { kind: 'none' };

/**
 * How `TaskResult.data` was produced
 */
export type TaskDataKind = DecodeOutcome<unknown>['kind'];

/**
 * Metadata attached to every task result
 */
export interface TaskResultMetadata {
  task_id: string;
  operation_id: string;
  protocol: Protocol;
  context_id?: string;
  message?: string;
  timestamp?: string;
}

/**
 * Status as reported by the transport, before mapping
 */
export interface RawStatus {
  protocol: Protocol;
  value: string;
}

/**
 * Status after mapping, paired with the raw value for logging
 */
export interface MappedStatus extends RawStatus {
  status: TaskStatus;
}
