/**
 * @hostloop/observability
 *
 * Structured logging and metrics shared by every package.
 */

export { ObservabilityLogger, getLogger, logger, type LogLevel } from './logger.js';
export { getObservabilityConfig, detectEnvironment, type ObservabilityConfig } from './config.js';
export {
  initializeMetrics,
  recordDroppedEvent,
  recordOAuthEvent,
  recordRpcCall,
  recordTaskLifecycle,
  type MetricInstruments,
  type OAuthMetricEvent,
  type RpcMetricKind,
} from './metrics.js';
