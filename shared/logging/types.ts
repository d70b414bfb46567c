/**
 * Logging Types
 *
 * Shared by every Waypoint package. Entries are structured so the file
 * transport can write them as JSON lines and tests can assert on them.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component name, e.g. "server.tools" */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  /** Ties together every entry produced while handling one chat turn */
  correlationId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered entries (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped before reaching any transport */
  minLevel: LogLevel;
  component: string;
  correlationId?: string;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  child(context: { component?: string; correlationId?: string }): ILogger;
  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
];
