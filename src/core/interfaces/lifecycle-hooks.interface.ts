import { TaskResult } from '../domain/models';
import { Protocol } from '../domain/enums';

/**
 * Context passed to lifecycle hooks
 */
export interface HookContext {
  processingId: string;
  taskType: string;
  operationId: string;
  protocol?: Protocol;
  stageDurations: Map<string, number>;
  totalDurationMs: number;
}

/**
 * Optional callbacks around webhook handling.
 * Hook failures are logged and never change the outcome of the call.
 */
export interface LifecycleHooks {
  /**
   * Called once a TaskResult has been built
   */
  onTaskResult?: (result: TaskResult, context: HookContext) => Promise<void> | void;

  /**
   * Called before a fatal error is rethrown
   */
  onError?: (error: Error, context: HookContext) => Promise<void> | void;
}
