/**
 * Gateway Idle Analyzer - Centralized Logger
 *
 * Structured JSON lines on the console, one entry per call, with a persistent
 * context (region, account, run) merged into every entry.
 * Set LOG_FORMAT=pretty for a human-readable line while working locally.
 */

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  /** Correlates every entry of one analysis run */
  runId?: string;
  accountId?: string;
  region?: string;
  gatewayId?: string;
  metricName?: string;
  durationMs?: number;
  /** Additional metadata */
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  runId?: string;
  accountId?: string;
  region?: string;
  durationMs?: number;
  errorName?: string;
  errorMessage?: string;
  errorStack?: string;
  meta?: Record<string, unknown>;
}

export interface LoggerOptions {
  service?: string;
  minLevel?: LogLevel;
  format?: LogFormat;
}

// ============================================================================
// LOGGER CLASS
// ============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  CRITICAL: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export class GatewayLogger {
  private service: string;
  private minLevel: LogLevel;
  private format: LogFormat;
  private persistentContext: Partial<LogContext> = {};

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    this.service = options.service ?? process.env.SERVICE_NAME ?? 'idle-gateway-analyzer';
    this.minLevel = options.minLevel ?? (isLogLevel(envLevel) ? envLevel : 'INFO');
    this.format = options.format ?? (process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json');
  }

  /** Set persistent context included in ALL subsequent logs. */
  setContext(context: Partial<LogContext>): void {
    this.persistentContext = { ...context };
  }

  /** Add keys to existing persistent context without overwriting. */
  appendContext(context: Partial<LogContext>): void {
    this.persistentContext = { ...this.persistentContext, ...context };
  }

  clearContext(): void {
    this.persistentContext = {};
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  // --------------------------------------------------------------------------
  // Core log methods
  // --------------------------------------------------------------------------

  debug(message: string, meta?: Record<string, unknown>): void {
    this._log('DEBUG', message, undefined, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this._log('INFO', message, undefined, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this._log('WARN', message, undefined, meta);
  }

  error(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void {
    this._log('ERROR', message, error, meta);
  }

  critical(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void {
    this._log('CRITICAL', message, error, meta);
  }

  /** Log a slow operation */
  slowOperation(operation: string, durationMs: number, thresholdMs: number, meta?: Record<string, unknown>): void {
    this._log('WARN', `SLOW_OPERATION: ${operation} took ${durationMs}ms (threshold: ${thresholdMs}ms)`, undefined, {
      type: 'slow_operation',
      operation,
      durationMs,
      thresholdMs,
      ...meta,
    });
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private _log(level: LogLevel, message: string, error?: Error | unknown, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const { runId, accountId, region, ...contextRest } = this.persistentContext;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.service,
      runId,
      accountId,
      region,
    };

    if (typeof meta?.durationMs === 'number') entry.durationMs = meta.durationMs;

    if (error instanceof Error) {
      entry.errorName = error.name;
      entry.errorMessage = error.message;
      entry.errorStack = error.stack;
    } else if (error !== undefined && error !== null) {
      entry.errorMessage = String(error);
    }

    const merged: Record<string, unknown> = { ...contextRest, ...meta };
    delete merged.durationMs;
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }

    const cleanEntry = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined && v !== null)
    );

    const line = this.format === 'pretty' ? formatPretty(entry) : JSON.stringify(cleanEntry);
    switch (level) {
      case 'DEBUG':
        console.debug(line);
        break;
      case 'INFO':
        console.info(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      case 'ERROR':
      case 'CRITICAL':
        console.error(line);
        break;
    }
  }
}

function formatPretty(entry: LogEntry): string {
  const meta = entry.meta ? ` ${JSON.stringify(entry.meta)}` : '';
  const err = entry.errorMessage ? ` (${entry.errorName ?? 'Error'}: ${entry.errorMessage})` : '';
  return `${entry.timestamp} [${entry.level}] ${entry.message}${err}${meta}`;
}

// ============================================================================
// SINGLETON EXPORT
// ============================================================================

export const logger = new GatewayLogger();
export default logger;
