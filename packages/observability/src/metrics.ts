/**
 * Host loop metrics
 * Tracks OAuth flows, document calls and background tasks
 *
 * Instruments come from the global OpenTelemetry meter provider; without
 * a registered SDK they are no-ops.
 */

import { metrics, type Counter, type Histogram, type UpDownCounter } from '@opentelemetry/api';
import { getObservabilityConfig } from './config.js';

export type OAuthMetricEvent = 'started' | 'completed' | 'refreshed' | 'failed';

export type RpcMetricKind = 'get' | 'set' | 'delete' | 'watchStart' | 'watchStop';

export interface MetricInstruments {
  oauthEvents: Counter;
  rpcCalls: Counter;
  rpcDuration: Histogram;
  activeTasks: UpDownCounter;
  droppedEvents: Counter;
}

let instruments: MetricInstruments | undefined;

/**
 * Create the instruments once; later calls reuse them
 */
export function initializeMetrics(): MetricInstruments {
  if (instruments) {
    return instruments;
  }

  const config = getObservabilityConfig();
  const meter = metrics.getMeter(config.service.name, config.service.version);

  instruments = {
    oauthEvents: meter.createCounter('hostloop_oauth_events_total', {
      description: 'OAuth flow starts, completions, refreshes and failures'
    }),
    rpcCalls: meter.createCounter('hostloop_rpc_calls_total', {
      description: 'Document calls completed, by kind and outcome'
    }),
    rpcDuration: meter.createHistogram('hostloop_rpc_duration_ms', {
      description: 'Duration of document calls in milliseconds'
    }),
    activeTasks: meter.createUpDownCounter('hostloop_bridge_active_tasks', {
      description: 'Background tasks currently running'
    }),
    droppedEvents: meter.createCounter('hostloop_bridge_dropped_events_total', {
      description: 'Events posted by tasks that had already been cancelled'
    }),
  };
  return instruments;
}

export function recordOAuthEvent(provider: string, event: OAuthMetricEvent, errorCode?: string): void {
  initializeMetrics().oauthEvents.add(1, {
    provider,
    event,
    error_code: errorCode ?? 'none'
  });
}

export function recordRpcCall(kind: RpcMetricKind, durationMs: number, success: boolean, errorCode?: string): void {
  const { rpcCalls, rpcDuration } = initializeMetrics();

  rpcCalls.add(1, {
    kind,
    success: success.toString(),
    error_code: errorCode ?? 'none'
  });
  rpcDuration.record(durationMs, { kind });
}

export function recordTaskLifecycle(change: 'started' | 'finished'): void {
  initializeMetrics().activeTasks.add(change === 'started' ? 1 : -1);
}

export function recordDroppedEvent(): void {
  initializeMetrics().droppedEvents.add(1);
}
