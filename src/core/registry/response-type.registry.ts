import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { JsonObject } from '../interfaces/common.types';
import { SchemaValidationError } from '../errors';
import { flattenValidationErrors } from './validation-issues';

/**
 * Validates a task result and returns its typed model.
 * Must throw SchemaValidationError when the object does not fit.
 */
export type ResponseParser<T> = (data: JsonObject, taskType: string) => T;

/**
 * One parser per task type of the response map M
 */
export type ResponseParsers<M> = { [K in keyof M]: ResponseParser<M[K]> };

/**
 * Task type identifiers of a response map
 */
export type TaskTypeOf<M> = Extract<keyof M, string>;

/**
 * ResponseTypeRegistry - fixed mapping from task type to response parser.
 * Read-only after construction.
 */
export class ResponseTypeRegistry<M extends object> {
  private readonly parsers: Readonly<ResponseParsers<M>>;

  constructor(parsers: ResponseParsers<M>) {
    this.parsers = Object.freeze({ ...parsers });
  }

  /**
   * Whether a parser is registered for `taskType`
   */
  has(taskType: string): taskType is TaskTypeOf<M> {
    return Object.prototype.hasOwnProperty.call(this.parsers, taskType);
  }

  lookup<K extends TaskTypeOf<M>>(taskType: K): ResponseParser<M[K]> {
    return this.parsers[taskType];
  }

  taskTypes(): TaskTypeOf<M>[] {
    return Object.keys(this.parsers).filter((key): key is TaskTypeOf<M> =>
      this.has(key),
    );
  }
}

/**
 * Build a parser from a class-validator decorated response model
 */
export function classResponseParser<T extends object>(
  model: ClassConstructor<T>,
): ResponseParser<T> {
  return (data: JsonObject, taskType: string): T => {
    const instance = plainToInstance(model, data);
    const errors = validateSync(instance);

    if (errors.length > 0) {
      throw new SchemaValidationError(taskType, flattenValidationErrors(errors));
    }

    return instance;
  };
}
