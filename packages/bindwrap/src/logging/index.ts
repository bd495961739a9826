/**
 * bindwrap Structured Logging Module
 *
 * Provides structured logging with trace IDs, log levels, JSON output,
 * child loggers and configurable sinks.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Get log level from the LOG_LEVEL environment variable
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for correlating the entries of one logger and its children */
  traceId: string;
  context?: Record<string, unknown>;
  /** Error details if logging an error */
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Sink used when the primary sink throws */
  fallbackSink?: LogSink;
  /** Whether to include stack traces (default true) */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>, error?: Error): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getTraceId(): string;

  getLevel(): LogLevel;

  /** Set log level at runtime */
  setLevel(level: LogLevel): void;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Safely copy objects with circular reference handling
 */
function safeStringify(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof obj === 'bigint') {
    return obj.toString();
  }

  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (seen.has(obj)) {
    return '[Circular]';
  }

  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map(item => safeStringify(item, seen));
  }

  if (obj instanceof Uint8Array) {
    return `<${obj.byteLength} bytes>`;
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = safeStringify(value, seen);
  }

  return result;
}

function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const seen = new WeakSet<object>();
  for (const [key, value] of Object.entries(context)) {
    result[key] = safeStringify(value, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private sink: LogSink;
  private fallbackSink?: LogSink;
  private defaultContext: Record<string, unknown>;
  private includeStackTraces: boolean;
  private traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.fallbackSink = config.fallbackSink;
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this.traceId = config.traceId ?? randomUUID();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    // Lazy messages are only built once the level check passed
    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context
      ? { ...this.defaultContext, ...context }
      : Object.keys(this.defaultContext).length > 0
        ? this.defaultContext
        : undefined;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this.traceId,
    };

    if (mergedContext && Object.keys(mergedContext).length > 0) {
      entry.context = sanitizeContext(mergedContext);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
      };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    try {
      this.sink.write(entry);
    } catch (sinkError) {
      if (!this.fallbackSink) {
        throw sinkError;
      }
      this.fallbackSink.write(entry);
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>, error?: Error): void {
    this.log('warn', message, context, error);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fallbackSink: this.fallbackSink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this.traceId,
    });
  }

  getTraceId(): string {
    return this.traceId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

export interface ConsoleSinkOptions {
  /** Enable colorized output */
  colorize?: boolean;
  prettyPrint?: boolean;
}

/**
 * Console sink for development
 */
export class ConsoleSink implements LogSink {
  private colorize: boolean;
  private prettyPrint: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colorize = options.colorize ?? false;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const output = this.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    if (this.colorize) {
      const colors: Record<LogLevel, string> = {
        debug: '\x1b[36m', // Cyan
        info: '\x1b[32m',  // Green
        warn: '\x1b[33m',  // Yellow
        error: '\x1b[31m', // Red
      };
      const reset = '\x1b[0m';
      console.log(`${colors[entry.level]}${output}${reset}`);
    } else {
      console.log(output);
    }
  }
}

export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private writeFn: (json: string) => void;
  private prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const json = this.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);
    this.writeFn(json);
  }
}

/**
 * Sink that discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // discard
  }
}
