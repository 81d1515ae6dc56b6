/**
 * Observability components for the table insert engine.
 *
 * Logging interface with console, no-op and in-memory implementations, and
 * throttled warnings for deprecated options.
 * @module sql-table-insert/observability
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
}

/**
 * Logger interface. Failures are raised to the caller, so there is no error level.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): Logger;
}

/** Context keys whose values never reach the console */
const REDACTED_KEYS = new Set(['password', 'secretaccesskey', 'accesskeyid']);

/**
 * Logger writing one JSON line per entry to the console. Defaults to WARN.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;

  constructor(options: { level?: LogLevel; context?: Record<string, unknown> } = {}) {
    this.level = options.level ?? LogLevel.WARN;
    this.context = options.context ?? {};
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({ level: this.level, context: { ...this.context, ...context } });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const merged = redact({ ...this.context, ...context });
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });

    if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function redact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (REDACTED_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redact(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Logger that discards everything. The default of every component.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  child(_context?: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * Entry recorded by {@link InMemoryLogger}.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * Logger that keeps entries in memory, for tests. Children append to the
 * parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.DEBUG, message, context: { ...this.context, ...context } });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.INFO, message, context: { ...this.context, ...context } });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.WARN, message, context: { ...this.context, ...context } });
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

// ============================================================================
// Throttled Warnings
// ============================================================================

/** Minimum interval between two warnings with the same id */
export const REGULAR_WARNING_INTERVAL_MS = 8 * 60 * 60 * 1000;

const lastWarnedAt = new Map<string, number>();

/**
 * Emits a warning at most once per interval for a given id.
 *
 * @returns Whether the warning was emitted
 */
export function warnRegularly(
  logger: Logger,
  id: string,
  message: string,
  now: number = Date.now()
): boolean {
  const previous = lastWarnedAt.get(id);
  if (previous !== undefined && now - previous < REGULAR_WARNING_INTERVAL_MS) {
    return false;
  }
  lastWarnedAt.set(id, now);
  logger.warn(message, { warningId: id });
  return true;
}

/**
 * Forgets all throttled warnings.
 */
export function resetRegularWarnings(): void {
  lastWarnedAt.clear();
}
