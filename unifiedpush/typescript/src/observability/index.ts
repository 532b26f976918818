/**
 * Observability components for the UnifiedPush sender.
 *
 * Provides logging and metrics interfaces with console, no-op and in-memory
 * implementations.
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Sensitive fields to redact from logs.
 */
const SENSITIVE_FIELDS = new Set([
  'authorization',
  'proxy-authorization',
  'mastersecret',
  'master_secret',
  'secret',
  'password',
  'proxypassword',
]);

/**
 * Redacts sensitive fields from an object, nested objects included.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Writes one JSON line per entry to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;

  /**
   * @param options.context - fields added to every entry
   */
  constructor(options: { level?: LogLevel; context?: Record<string, unknown> } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: LogLevel[level].toUpperCase(),
        message,
        ...redactSensitive({ ...this.context, ...context }),
      })
    );
  }
}

/**
 * No-op logger for disabled logging.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
}

/**
 * A captured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private readonly logs: LogEntry[] = [];

  trace(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: LogLevel.Trace, message, context: { ...context } });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: LogLevel.Debug, message, context: { ...context } });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: LogLevel.Info, message, context: { ...context } });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: LogLevel.Warn, message, context: { ...context } });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: LogLevel.Error, message, context: { ...context } });
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  clear(): void {
    this.logs.length = 0;
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names for the UnifiedPush sender.
 */
export const MetricNames = {
  /** HTTP requests made, redirects included */
  REQUESTS_TOTAL: 'unifiedpush_requests_total',
  /** Redirects followed */
  REDIRECTS_TOTAL: 'unifiedpush_redirects_total',
  /** Sends that reached a terminal status */
  SEND_COMPLETED: 'unifiedpush_send_completed',
  /** Sends that failed */
  SEND_FAILED: 'unifiedpush_send_failed',
  /** Send latency in seconds, whole redirect chain */
  SEND_LATENCY: 'unifiedpush_send_latency_seconds',
} as const;

/**
 * No-op metrics collector.
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(): void { /* noop */ }
  recordHistogram(): void { /* noop */ }
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
    return `${name}{${labelStr}}`;
  }
}
