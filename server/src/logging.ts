/**
 * Logging Setup
 *
 * Initializes the shared logging system for the assistant process.
 * Recent entries are always kept in memory for the CLI's `logs` command;
 * console and file output are switched on by initServerLogging.
 */

import {
  initLogger,
  Logger,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@waypoint/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "info") */
  minLevel?: LogLevel;
  /** Directory for JSON-lines log files; omitted means no file output */
  logDir?: string;
  /** Echo to stderr (default: false, the REPL owns the terminal) */
  console?: boolean;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

const buffer = new MemoryTransport({ minLevel: "debug", capacity: 500 });
let logger: Logger | null = null;

export function initServerLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel ?? "info";
  const transports: LogTransport[] = [buffer];

  if (options.console) {
    transports.push(new ConsoleTransport({ minLevel, colors: options.colors }));
  }

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "waypoint",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  logger = initLogger({ minLevel, component: "server", transports });
  return logger;
}

/**
 * The process logger. Before initServerLogging runs (e.g. under test) it
 * writes to the in-memory buffer only.
 */
export function getServerLogger(): Logger {
  if (!logger) {
    logger = initLogger({ minLevel: "debug", component: "server", transports: [buffer] });
  }
  return logger;
}

export function getLogBuffer(): MemoryTransport {
  return buffer;
}

// ============================================
// COMPONENT LOGGERS
// ============================================

/**
 * Logger for one component, resolved on every call so that modules can
 * create theirs at load time, before logging is configured.
 */
class ComponentLogger implements ILogger {
  constructor(private readonly component: string, private readonly correlationId?: string) {}

  private target(): Logger {
    return getServerLogger().child({ component: this.component, correlationId: this.correlationId });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().fatal(message, error, data);
  }

  child(context: { component?: string; correlationId?: string }): ILogger {
    return new ComponentLogger(context.component ?? this.component, context.correlationId ?? this.correlationId);
  }

  flush(): Promise<void> {
    return getServerLogger().flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger(`server.${component}`);
}
