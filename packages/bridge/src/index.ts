/**
 * @hostloop/bridge
 *
 * Hands background results to a non-blocking host loop.
 */

export { AsyncTaskBridge } from './async-task-bridge.js';
export { TaskCancelledError } from './errors.js';
export type {
  BridgeOptions,
  BridgeStatus,
  TaskContext,
  TaskHandle,
  TaskScheduler,
  TaskWork,
} from './types.js';
