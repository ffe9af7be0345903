/**
 * Structured logging with Pino and OpenTelemetry trace context
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Enhanced logger with Pino and OTEL integration
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;
  private hasTransports: boolean;

  constructor(config?: ObservabilityConfig) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.hasTransports = false; // Will be set in createPinoLogger

    this.pino = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    // Silence everything for concise test output
    if (this.config.environment === 'test') {
      return pino({ level: 'silent' });
    }

    const base = {
      service: this.config.service.name,
      version: this.config.service.version,
      namespace: this.config.service.namespace
    };

    if (this.config.exporters.console) {
      this.hasTransports = true;
      // When using transports, we can't use custom formatters
      return pino({
        level: this.config.level,
        base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,service,version,namespace',
            destination: 2 // stderr keeps stdout free for the host application
          }
        }
      });
    }

    return pino({
      level: this.config.level,
      base,
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object)
      }
    });
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags
      };
    }
    return logObject;
  }

  /**
   * Sanitize sensitive information for production
   */
  private sanitizeForProduction(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');

    let sanitizedData = data;
    if (data && typeof data === 'object') {
      sanitizedData = this.sanitizeObject(data);
    }

    return { message: sanitizedMessage, data: sanitizedData };
  }

  private sanitizeObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (visited.has(obj)) {
      return '[Circular Reference]';
    }
    visited.add(obj);

    if (Array.isArray(obj)) {
      return obj.map((item: unknown) => this.sanitizeObject(item, visited));
    }

    const sanitized: Record<string, unknown> = {};
    const sensitiveKeys = ['password', 'secret', 'token', 'key', 'auth', 'credential', 'verifier', 'code'];

    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();

      if (sensitiveKeys.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitizeObject(value, visited);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private toRecord(data: unknown): Record<string, unknown> {
    if (data === undefined || data === null) {
      return {};
    }
    if (typeof data === 'object' && !Array.isArray(data)) {
      return { ...data };
    }
    return { data };
  }

  // Trace context has to be added by hand when a transport owns formatting
  private withTrace(data: unknown): Record<string, unknown> {
    const record = this.toRecord(data);
    return this.hasTransports ? this.addTraceContext(record) : record;
  }

  debug(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.debug(this.withTrace(sanitizedData), sanitizedMessage);
  }

  info(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.info(this.withTrace(sanitizedData), sanitizedMessage);
  }

  warn(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.warn(this.withTrace(sanitizedData), sanitizedMessage);
  }

  error(message: string, error?: unknown): void {
    const { message: sanitizedMessage } = this.sanitizeForProduction(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(this.withTrace(errorInfo), sanitizedMessage);
    } else {
      const { data: sanitizedError } = this.sanitizeForProduction('', error);
      this.pino.error(this.withTrace(sanitizedError), sanitizedMessage);
    }
  }

  // OAuth-specific logging methods
  oauthDebug(message: string, data?: unknown): void {
    this.debug(`[OAuth] ${message}`, data);
  }

  oauthInfo(message: string, data?: unknown): void {
    this.info(`[OAuth] ${message}`, data);
  }

  oauthWarn(message: string, data?: unknown): void {
    this.warn(`[OAuth] ${message}`, data);
  }

  oauthError(message: string, error?: unknown): void {
    this.error(`[OAuth] ${message}`, error);
  }

  // Document RPC logging methods
  rpcDebug(message: string, data?: unknown): void {
    this.debug(`[RPC] ${message}`, data);
  }

  rpcInfo(message: string, data?: unknown): void {
    this.info(`[RPC] ${message}`, data);
  }

  rpcWarn(message: string, data?: unknown): void {
    this.warn(`[RPC] ${message}`, data);
  }

  rpcError(message: string, error?: unknown): void {
    this.error(`[RPC] ${message}`, error);
  }

  /**
   * Get underlying Pino logger for advanced usage
   */
  getPino(): pino.Logger {
    return this.pino;
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();
