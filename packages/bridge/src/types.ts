/**
 * Async Task Bridge types
 */

/**
 * What a background task can do. Everything it wants the host to see goes
 * through `post`; it never touches host-owned state directly.
 */
export interface TaskContext<TEvent> {
  /** Aborted when the task is cancelled or the bridge shuts down */
  readonly signal: AbortSignal;

  /** Queue an event for the next `drain()`; ignored once the task is cancelled */
  post(_event: TEvent): void;

  /** Resolve after `ms`, reject with TaskCancelledError if cancelled first */
  sleep(_ms: number): Promise<void>;

  /** Resolve once the event queue is below the high-water mark */
  waitForCapacity(): Promise<void>;
}

export type TaskWork<TEvent> = (_context: TaskContext<TEvent>) => Promise<void>;

export interface TaskHandle {
  readonly id: number;
  readonly label: string;
  readonly cancelled: boolean;
  /** Resolves when the work function has returned or thrown */
  readonly settled: Promise<void>;
  cancel(): void;
}

/**
 * The part of the bridge that producers (auth machines, document session)
 * depend on. Narrower event types are accepted by a wider bridge.
 */
export interface TaskScheduler<TEvent> {
  submit(_label: string, _work: TaskWork<TEvent>): TaskHandle;
  post(_event: TEvent): void;
}

export interface BridgeOptions {
  /** Queue length at which `waitForCapacity()` starts holding producers back */
  highWaterMark?: number;
}

export interface BridgeStatus {
  running: number;
  queued: number;
  highWaterMark: number;
  closed: boolean;
}
