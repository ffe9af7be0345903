/**
 * Raised inside a task when it has been cancelled
 */
export class TaskCancelledError extends Error {
  readonly code = 'task_cancelled';

  constructor(label: string) {
    super(`Task cancelled: ${label}`);
    this.name = 'TaskCancelledError';
  }
}
