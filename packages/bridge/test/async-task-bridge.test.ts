/**
 * Tests for AsyncTaskBridge
 */

import { vi } from 'vitest';
import { AsyncTaskBridge, TaskCancelledError } from '../src/index.js';

type TestEvent = { kind: 'done'; value: number } | { kind: 'note'; text: string };

describe('AsyncTaskBridge', () => {
  let bridge: AsyncTaskBridge<TestEvent>;

  beforeEach(() => {
    bridge = new AsyncTaskBridge<TestEvent>({ highWaterMark: 2 });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await bridge.shutdown();
  });

  describe('drain', () => {
    it('returns an empty sequence when nothing completed', () => {
      const before = bridge.getStatus();

      expect(bridge.drain()).toEqual([]);
      expect(bridge.drain()).toEqual([]);
      expect(bridge.getStatus()).toEqual(before);
    });

    it('returns events once and then clears them', async () => {
      const task = bridge.submit('one', async (ctx) => {
        ctx.post({ kind: 'done', value: 1 });
      });
      await task.settled;

      expect(bridge.drain()).toEqual([{ kind: 'done', value: 1 }]);
      expect(bridge.drain()).toEqual([]);
    });
  });

  describe('submit', () => {
    it('does not run work inside the caller', () => {
      let started = false;
      bridge.submit('lazy', async () => {
        started = true;
      });

      expect(started).toBe(false);
    });

    it('delivers events in completion order, not submission order', async () => {
      let releaseSlow: () => void = () => {};
      const slowGate = new Promise<void>((resolve) => {
        releaseSlow = resolve;
      });

      const slow = bridge.submit('slow', async (ctx) => {
        await slowGate;
        ctx.post({ kind: 'done', value: 1 });
      });
      const fast = bridge.submit('fast', async (ctx) => {
        ctx.post({ kind: 'done', value: 2 });
      });

      await fast.settled;
      releaseSlow();
      await slow.settled;

      expect(bridge.drain()).toEqual([
        { kind: 'done', value: 2 },
        { kind: 'done', value: 1 },
      ]);
    });

    it('interleaves host posts with task results in arrival order', async () => {
      bridge.post({ kind: 'note', text: 'first' });
      const task = bridge.submit('task', async (ctx) => {
        ctx.post({ kind: 'done', value: 7 });
      });
      await task.settled;
      bridge.post({ kind: 'note', text: 'last' });

      expect(bridge.drain()).toEqual([
        { kind: 'note', text: 'first' },
        { kind: 'done', value: 7 },
        { kind: 'note', text: 'last' },
      ]);
    });

    it('contains errors thrown by work', async () => {
      const task = bridge.submit('broken', async () => {
        throw new Error('boom');
      });

      await expect(task.settled).resolves.toBeUndefined();
      expect(bridge.drain()).toEqual([]);
      expect(bridge.getStatus().running).toBe(0);
    });
  });

  describe('cancel', () => {
    it('drops events posted after cancellation', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const task = bridge.submit('cancelled', async (ctx) => {
        await gate;
        ctx.post({ kind: 'done', value: 1 });
      });
      task.cancel();
      release();
      await task.settled;

      expect(task.cancelled).toBe(true);
      expect(bridge.drain()).toEqual([]);
    });

    it('interrupts sleep with TaskCancelledError', async () => {
      vi.useFakeTimers();
      let caught: unknown;

      const task = bridge.submit('sleeper', async (ctx) => {
        try {
          await ctx.sleep(60_000);
        } catch (error) {
          caught = error;
        }
      });
      await vi.advanceTimersByTimeAsync(10);
      task.cancel();
      await task.settled;

      expect(caught).toBeInstanceOf(TaskCancelledError);
    });

    it('sleeps past the longest single timer delay', async () => {
      vi.useFakeTimers();
      const day = 24 * 60 * 60 * 1000;
      const task = bridge.submit('long-sleeper', async (ctx) => {
        await ctx.sleep(40 * day);
        ctx.post({ kind: 'done', value: 40 });
      });

      await vi.advanceTimersByTimeAsync(30 * day);
      expect(bridge.drain()).toEqual([]);

      await vi.advanceTimersByTimeAsync(10 * day);
      await task.settled;
      expect(bridge.drain()).toEqual([{ kind: 'done', value: 40 }]);
    });

    it('skips work cancelled before it started', async () => {
      let ran = false;
      const task = bridge.submit('never', async () => {
        ran = true;
      });
      task.cancel();

      await task.settled;

      expect(ran).toBe(false);
      expect(bridge.getStatus().running).toBe(0);
    });

    it('lets sleep finish when not cancelled', async () => {
      vi.useFakeTimers();
      const task = bridge.submit('sleeper', async (ctx) => {
        await ctx.sleep(500);
        ctx.post({ kind: 'done', value: 500 });
      });

      await vi.advanceTimersByTimeAsync(499);
      expect(bridge.drain()).toEqual([]);
      await vi.advanceTimersByTimeAsync(1);
      await task.settled;

      expect(bridge.drain()).toEqual([{ kind: 'done', value: 500 }]);
    });
  });

  describe('waitForCapacity', () => {
    it('holds a producer at the high-water mark until the next drain', async () => {
      const produced: number[] = [];

      const task = bridge.submit('producer', async (ctx) => {
        for (let value = 1; value <= 3; value++) {
          await ctx.waitForCapacity();
          ctx.post({ kind: 'done', value });
          produced.push(value);
        }
      });

      await new Promise((resolve) => setImmediate(resolve));
      expect(produced).toEqual([1, 2]);

      expect(bridge.drain()).toEqual([
        { kind: 'done', value: 1 },
        { kind: 'done', value: 2 },
      ]);
      await task.settled;

      expect(produced).toEqual([1, 2, 3]);
      expect(bridge.drain()).toEqual([{ kind: 'done', value: 3 }]);
    });
  });

  describe('shutdown', () => {
    it('cancels running tasks and discards their events', async () => {
      const task = bridge.submit('forever', async (ctx) => {
        await new Promise<void>((resolve) => ctx.signal.addEventListener('abort', () => resolve()));
        ctx.post({ kind: 'done', value: 0 });
      });
      bridge.post({ kind: 'note', text: 'queued' });

      await bridge.shutdown();

      expect(task.cancelled).toBe(true);
      expect(bridge.drain()).toEqual([]);
      expect(bridge.getStatus()).toEqual({ running: 0, queued: 0, highWaterMark: 2, closed: true });
    });

    it('refuses new work afterwards', async () => {
      await bridge.shutdown();
      let ran = false;

      const task = bridge.submit('late', async () => {
        ran = true;
      });
      await task.settled;

      expect(ran).toBe(false);
      expect(task.cancelled).toBe(true);
    });
  });
});
