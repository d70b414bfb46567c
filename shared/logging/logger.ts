/**
 * Core Logger Implementation
 *
 * Structured logging fanned out to any number of transports.
 */

import {
  LogLevel,
  LogEntry,
  LoggerConfig,
  ILogger,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
} from "./types.js";

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  get component(): string {
    return this.config.component;
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };

    if (this.config.correlationId) {
      entry.correlationId = this.config.correlationId;
    }

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // A broken transport must not take the caller down with it
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: { component?: string; correlationId?: string }): Logger {
    return new Logger({
      ...this.config,
      component: context.component ?? this.config.component,
      correlationId: context.correlationId ?? this.config.correlationId,
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// ============================================
// FACTORY
// ============================================

export function initLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
