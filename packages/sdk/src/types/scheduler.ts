/**
 * Scheduler abstraction for the report loop.
 */

/** Cancels a scheduled task. After it returns, the task does not start again. */
export type CancelSchedule = () => void;

export interface Scheduler {
  scheduleRepeating(task: () => void, intervalMs: number): CancelSchedule;
}
