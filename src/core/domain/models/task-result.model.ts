import { TaskStatus } from '../enums';
import {
  DecodeOutcome,
  JsonObject,
  TaskDataKind,
  TaskResultMetadata,
} from '../../interfaces/common.types';

/**
 * Plain representation of a task result (for JSON responses and logs)
 */
export interface TaskResultSnapshot<T> {
  success: boolean;
  status: TaskStatus;
  data: T | JsonObject | null;
  dataKind: TaskDataKind;
  error: string | null;
  metadata: TaskResultMetadata;
}

/**
 * TaskResult - the transport-agnostic outcome of one webhook delivery.
 * Immutable once constructed.
 */
export class TaskResult<T = unknown> {
  readonly success: boolean;
  readonly data: T | JsonObject | null;
  readonly dataKind: TaskDataKind;
  readonly metadata: Readonly<TaskResultMetadata>;

  constructor(
    public readonly status: TaskStatus,
    outcome: DecodeOutcome<T>,
    public readonly error: string | null,
    metadata: TaskResultMetadata,
  ) {
    this.success = status === TaskStatus.COMPLETED && error === null;
    this.dataKind = outcome.kind;
    this.data = outcome.kind === 'none' ? null : outcome.value;
    this.metadata = Object.freeze({ ...metadata });
    Object.freeze(this);
  }

  get taskId(): string {
    return this.metadata.task_id;
  }

  get operationId(): string {
    return this.metadata.operation_id;
  }

  /**
   * Whether `data` is an instance of the task type's response model
   */
  isTyped(): boolean {
    return this.dataKind === 'typed';
  }

  toPlainObject(): TaskResultSnapshot<T> {
    return {
      success: this.success,
      status: this.status,
      data: this.data,
      dataKind: this.dataKind,
      error: this.error,
      metadata: { ...this.metadata },
    };
  }
}
