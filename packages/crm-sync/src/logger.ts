/**
 * CRM Sync - Structured Logger
 *
 * Structured JSON logging for the sync services. Domain events:
 * sync_requested, sync_completed, sync_failed, tasks_synced, token_acquired,
 * rate_limited, request_retried, crm_updates_approved, sync_record_updated,
 * operation_tracked.
 *
 * @module logger
 */

import type {
  LogEvent,
  SyncRequestedEvent,
  SyncCompletedEvent,
  SyncFailedEvent,
  TasksSyncedEvent,
  TokenAcquiredEvent,
  RateLimitedEvent,
  RequestRetriedEvent,
  CRMUpdatesApprovedEvent,
  SyncRecordUpdatedEvent,
  OperationTrackedEvent,
} from './types';

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Output format */
  format: 'json' | 'pretty';

  /** Include stack traces in errors */
  includeStack: boolean;

  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
  includeStack: true,
};

/** Event payload as passed by callers; the logger stamps event and timestamp */
type EventParams<E extends LogEvent> = Omit<E, 'event' | 'timestamp'>;

// ===========================================
// Log Level Utilities
// ===========================================

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

function shouldLog(currentLevel: LogLevel, targetLevel: LogLevel): boolean {
  return LOG_LEVELS[currentLevel] <= LOG_LEVELS[targetLevel];
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

// ===========================================
// Logger Class
// ===========================================

export class SyncLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Update logger configuration
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Logger sharing this configuration with extra metadata on every line
   */
  child(metadata: Record<string, unknown>): SyncLogger {
    return new SyncLogger({
      ...this.config,
      metadata: { ...this.config.metadata, ...metadata },
    });
  }

  // ===========================================
  // Core Logging Methods
  // ===========================================

  private formatEvent(event: LogEvent): string {
    const enriched = { ...event, ...this.config.metadata };

    if (this.config.format === 'json') {
      return JSON.stringify(enriched);
    }

    const { event: eventType, timestamp, ...rest } = enriched;
    const time = new Date(timestamp).toISOString().split('T')[1];
    return `[${time}] ${eventType.toUpperCase()} ${JSON.stringify(rest)}`;
  }

  private emit<E extends LogEvent>(level: LogLevel, event: E): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }
    write(level, this.formatEvent(event));
  }

  private message(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!shouldLog(this.config.level, level)) return;

    if (this.config.format === 'json') {
      write(
        level,
        JSON.stringify({
          level,
          message,
          timestamp: new Date().toISOString(),
          ...this.config.metadata,
          ...context,
        })
      );
    } else {
      write(level, `[${level.toUpperCase()}] ${message}${context ? ` ${JSON.stringify(context)}` : ''}`);
    }
  }

  // ===========================================
  // Event Logging Methods
  // ===========================================

  syncRequested(params: EventParams<SyncRequestedEvent>): void {
    this.emit<SyncRequestedEvent>('info', {
      event: 'sync_requested',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  syncCompleted(params: EventParams<SyncCompletedEvent>): void {
    this.emit<SyncCompletedEvent>('info', {
      event: 'sync_completed',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  syncFailed(params: EventParams<SyncFailedEvent>): void {
    this.emit<SyncFailedEvent>('error', {
      event: 'sync_failed',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  tasksSynced(params: EventParams<TasksSyncedEvent>): void {
    this.emit<TasksSyncedEvent>(params.tasks_failed > 0 ? 'warn' : 'info', {
      event: 'tasks_synced',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  tokenAcquired(params: EventParams<TokenAcquiredEvent>): void {
    this.emit<TokenAcquiredEvent>('debug', {
      event: 'token_acquired',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  rateLimited(params: EventParams<RateLimitedEvent>): void {
    this.emit<RateLimitedEvent>(params.source === 'remote_429' ? 'warn' : 'debug', {
      event: 'rate_limited',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  requestRetried(params: EventParams<RequestRetriedEvent>): void {
    this.emit<RequestRetriedEvent>('warn', {
      event: 'request_retried',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  crmUpdatesApproved(params: EventParams<CRMUpdatesApprovedEvent>): void {
    this.emit<CRMUpdatesApprovedEvent>('info', {
      event: 'crm_updates_approved',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  syncRecordUpdated(params: EventParams<SyncRecordUpdatedEvent>): void {
    this.emit<SyncRecordUpdatedEvent>('info', {
      event: 'sync_record_updated',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  operationTracked(params: EventParams<OperationTrackedEvent>): void {
    this.emit<OperationTrackedEvent>('debug', {
      event: 'operation_tracked',
      timestamp: new Date().toISOString(),
      ...params,
    });
  }

  // ===========================================
  // Convenience Methods
  // ===========================================

  debug(message: string, context?: Record<string, unknown>): void {
    this.message('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.message('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.message('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorContext: Record<string, unknown> = { ...context };

    if (error instanceof Error) {
      errorContext.error_name = error.name;
      errorContext.error_message = error.message;
      if (this.config.includeStack) {
        errorContext.stack = error.stack;
      }
    } else if (error !== undefined) {
      errorContext.error = String(error);
    }

    this.message('error', message, errorContext);
  }

  // ===========================================
  // Metrics Helpers
  // ===========================================

  /**
   * Create a timer for measuring durations
   */
  startTimer(): () => number {
    const start = performance.now();
    return () => Math.round(performance.now() - start);
  }
}

// ===========================================
// Factory Functions
// ===========================================

export function createLogger(config?: Partial<LoggerConfig>): SyncLogger {
  return new SyncLogger(config);
}

// ===========================================
// Singleton Instance
// ===========================================

let defaultLogger: SyncLogger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(): SyncLogger {
  if (!defaultLogger) {
    defaultLogger = new SyncLogger();
  }
  return defaultLogger;
}

/**
 * Set the default logger
 */
export function setLogger(logger: SyncLogger): void {
  defaultLogger = logger;
}
