/**
 * Observability configuration with environment detection
 */

import type { LogLevel } from './logger.js';

export interface ObservabilityConfig {
  enabled: boolean;
  environment: 'development' | 'production' | 'test';
  level: LogLevel;
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
    namespace?: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();
  const requestedLevel = process.env.LOG_LEVEL;

  const config: ObservabilityConfig = {
    enabled: environment !== 'test',
    environment,
    level: isLogLevel(requestedLevel) ? requestedLevel : 'info',
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'hostloop',
      version: process.env.npm_package_version ?? '1.0.0',
      namespace: environment === 'production' ? 'prod' : 'dev'
    },
    exporters: {
      console: environment === 'development'
    }
  };

  switch (environment) {
    case 'development':
      if (!isLogLevel(requestedLevel)) {
        config.level = 'debug';
      }
      break;

    case 'production':
      config.exporters.console = false;
      break;

    case 'test':
      config.enabled = false;
      config.exporters.console = false;
      break;
  }

  return config;
}
