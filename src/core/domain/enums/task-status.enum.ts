/**
 * Canonical task states shared by every transport.
 * Each task snapshot carries exactly one of these.
 */
export enum TaskStatus {
  /**
   * Accepted by the agent, not started yet
   */
  SUBMITTED = 'submitted',

  /**
   * Agent is processing the task
   */
  WORKING = 'working',

  /**
   * Agent is blocked on the buyer (approval, missing field, ...)
   */
  NEEDS_INPUT = 'input_required',

  /**
   * Task finished (terminal)
   */
  COMPLETED = 'completed',

  /**
   * Task failed (terminal)
   */
  FAILED = 'failed',
}

/**
 * Helper to determine if a status is terminal (no further updates expected)
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatus.COMPLETED || status === TaskStatus.FAILED;
}

/**
 * Statuses whose payload may carry an actionable error message
 */
export function isErrorReportingStatus(status: TaskStatus): boolean {
  return status === TaskStatus.FAILED || status === TaskStatus.NEEDS_INPUT;
}
