/**
 * Logging for the REST JSON client.
 *
 * The client only logs; nothing it writes here changes control flow.
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels in order of severity. The client logs request traffic at debug,
 * transport failures at warn, and JSON-layer problems at error.
 */
export enum LogLevel {
  Debug = 0,
  Warn = 1,
  Error = 2,
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Parses a level name (case-insensitive) into a LogLevel.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return undefined;
  }
}

/**
 * Sensitive fields to redact from logs.
 */
const SENSITIVE_FIELDS = new Set([
  'password',
  'authorization',
  'credentials',
  'userpass',
  'user_pass',
  'token',
  'secret',
]);

/**
 * Redacts sensitive fields from an object.
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
 * Writes one line per event to the console:
 * `[<time>] WARN HttpClient: Request failed {"method":"GET",...}`.
 *
 * The `component` context key becomes the line's prefix; the rest of the
 * context is appended as JSON with sensitive fields redacted.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;

  constructor(options: { level?: LogLevel; context?: Record<string, unknown> } = {}) {
    this.level = options.level ?? LogLevel.Warn;
    this.context = options.context ?? {};
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({ level: this.level, context: { ...this.context, ...context } });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const { component, ...rest } = redactSensitive({ ...this.context, ...context });
    const prefix = typeof component === 'string' ? `${component}: ` : '';
    const fields = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    const line = `[${new Date().toISOString()}] ${LogLevel[level].toUpperCase()} ${prefix}${message}${fields}`;

    if (level === LogLevel.Debug) {
      console.debug(line);
    } else {
      console.error(line);
    }
  }
}

/**
 * No-op logger for disabled logging.
 */
export class NoopLogger implements Logger {
  debug(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

/**
 * A log entry captured by InMemoryLogger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * Captures log events for assertions. Children append to the same list.
 */
export class InMemoryLogger implements Logger {
  private readonly log: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, log: LogEntry[] = []) {
    this.context = context;
    this.log = log;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log.push({ level: LogLevel.Debug, message, context: { ...this.context, ...context } });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log.push({ level: LogLevel.Warn, message, context: { ...this.context, ...context } });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log.push({ level: LogLevel.Error, message, context: { ...this.context, ...context } });
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.log);
  }

  /** Everything logged so far, in order. */
  get entries(): readonly LogEntry[] {
    return this.log;
  }

  /**
   * Messages logged at the given level, in order.
   */
  messages(level: LogLevel): string[] {
    return this.log.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  clear(): void {
    this.log.length = 0;
  }
}

/**
 * Logger used when none is configured.
 */
export const defaultLogger: Logger = new ConsoleLogger();
