import {
  DecodeOutcome,
  JsonObject,
  isJsonObject,
} from '../interfaces/common.types';
import { SchemaValidationError } from '../errors';
import { ResponseTypeRegistry, TaskTypeOf } from '../registry';

/**
 * TypedResultDecoder - turns an extracted task result into the response
 * model registered for its task type.
 *
 * A result the model rejects is handed back untouched as a `raw` outcome:
 * agents running a newer (or sloppier) schema still reach the caller.
 */
export class TypedResultDecoder<M extends object> {
  constructor(private readonly registry: ResponseTypeRegistry<M>) {}

  decode<K extends TaskTypeOf<M>>(
    taskType: K,
    result: JsonObject | null,
  ): DecodeOutcome<M[K]>;
  decode(taskType: string, result: JsonObject | null): DecodeOutcome<unknown>;
  decode(taskType: string, result: JsonObject | null): DecodeOutcome<unknown> {
    if (result === null) {
      return { kind: 'none' };
    }

    if (!this.registry.has(taskType)) {
      return {
        kind: 'raw',
        value: result,
        issues: [`No response model registered for task type '${taskType}'`],
      };
    }

    try {
      const parse = this.registry.lookup(taskType);
      return { kind: 'typed', value: parse(result, taskType) };
    } catch (error) {
      if (error instanceof SchemaValidationError) {
        return { kind: 'raw', value: result, issues: error.issues };
      }
      throw error;
    }
  }

  /**
   * Message of the first well-formed entry in `result.errors`
   */
  extractFirstError(result: JsonObject | null): string | null {
    const errors = result?.errors;
    if (!Array.isArray(errors)) {
      return null;
    }

    for (const entry of errors) {
      if (isJsonObject(entry) && typeof entry.message === 'string') {
        return entry.message;
      }
    }

    return null;
  }
}
