/**
 * Async Task Bridge
 *
 * Runs network work off the host tick and hands results back through one
 * ordered queue. The host calls `drain()` once per tick; that call is the
 * only place completed work becomes visible to host-owned state.
 */

import { logger, recordDroppedEvent, recordTaskLifecycle } from '@hostloop/observability';
import { TaskCancelledError } from './errors.js';
import type {
  BridgeOptions,
  BridgeStatus,
  TaskContext,
  TaskHandle,
  TaskScheduler,
  TaskWork,
} from './types.js';

const DEFAULT_HIGH_WATER_MARK = 1000;

/** Largest delay setTimeout honours */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface TaskRuntime {
  readonly handle: TaskHandle;
  readonly abortController: AbortController;
}

export class AsyncTaskBridge<TEvent> implements TaskScheduler<TEvent> {
  private readonly highWaterMark: number;
  private queue: TEvent[] = [];
  private readonly running = new Map<number, TaskRuntime>();
  private capacityWaiters: Array<() => void> = [];
  private nextTaskId = 1;
  private closed = false;

  constructor(options: BridgeOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
  }

  /**
   * Schedule background work. Returns immediately; the work starts on a
   * later microtask so nothing runs inside the caller's tick.
   */
  submit(label: string, work: TaskWork<TEvent>): TaskHandle {
    const id = this.nextTaskId++;
    const abortController = new AbortController();
    const signal = abortController.signal;

    if (this.closed) {
      abortController.abort();
      logger.warn('Task submitted after bridge shutdown', { label });
      return {
        id,
        label,
        cancelled: true,
        settled: Promise.resolve(),
        cancel: () => {},
      };
    }

    const context: TaskContext<TEvent> = {
      signal,
      post: (event) => {
        if (signal.aborted || this.closed) {
          recordDroppedEvent();
          return;
        }
        this.queue.push(event);
      },
      sleep: (ms) => sleep(ms, signal, label),
      waitForCapacity: () => this.waitForCapacity(signal, label),
    };

    recordTaskLifecycle('started');
    const settled = Promise.resolve()
      .then(() => {
        // Cancelled before it started: the abort event has already fired
        if (signal.aborted) {
          return;
        }
        return work(context);
      })
      .catch((error: unknown) => {
        if (signal.aborted) {
          logger.debug('Task ended after cancellation', { id, label });
          return;
        }
        logger.error(`Task failed: ${label}`, error);
      })
      .finally(() => {
        this.running.delete(id);
        recordTaskLifecycle('finished');
      });

    const handle: TaskHandle = {
      id,
      label,
      settled,
      get cancelled() {
        return signal.aborted;
      },
      cancel: () => {
        if (!signal.aborted) {
          abortController.abort();
          logger.debug('Task cancelled', { id, label });
        }
      },
    };

    this.running.set(id, { handle, abortController });
    return handle;
  }

  /**
   * Queue an event from the host side (e.g. a local failure that must
   * still arrive in completion order with everything else)
   */
  post(event: TEvent): void {
    if (this.closed) {
      return;
    }
    this.queue.push(event);
  }

  /**
   * Everything completed since the previous call, oldest first. An empty
   * queue yields `[]` and changes nothing.
   */
  drain(): TEvent[] {
    if (this.queue.length === 0) {
      return [];
    }

    const events = this.queue;
    this.queue = [];

    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    for (const resume of waiters) {
      resume();
    }

    return events;
  }

  /**
   * Cancel every running task and wait for them to unwind. Events they
   * post while unwinding are discarded.
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const runtimes = Array.from(this.running.values());
    for (const runtime of runtimes) {
      runtime.abortController.abort();
    }

    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    for (const resume of waiters) {
      resume();
    }

    await Promise.allSettled(runtimes.map((runtime) => runtime.handle.settled));
    this.queue = [];

    logger.debug('Bridge shut down', { cancelledTasks: runtimes.length });
  }

  getStatus(): BridgeStatus {
    return {
      running: this.running.size,
      queued: this.queue.length,
      highWaterMark: this.highWaterMark,
      closed: this.closed,
    };
  }

  private waitForCapacity(signal: AbortSignal, label: string): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(new TaskCancelledError(label));
    }
    if (this.queue.length < this.highWaterMark) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new TaskCancelledError(label));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.capacityWaiters.push(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }
}

function sleep(ms: number, signal: AbortSignal, label: string): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(new TaskCancelledError(label));
  }

  return new Promise<void>((resolve, reject) => {
    let remaining = Math.max(0, ms);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TaskCancelledError(label));
    };

    // Longer delays would fire at once, so wait in capped steps
    const arm = (): void => {
      const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, step);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    arm();
  });
}
