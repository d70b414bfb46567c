/**
 * Centralized Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport, FileTransport } from "@waypoint/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "~/.waypoint/logs" })],
 * });
 *
 * const toolLog = logger.child({ component: "server.tools" });
 * toolLog.warn("Unknown tool requested", { name: "make_coffee" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  initLogger,
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
  type MemoryTransportOptions,
} from "./transports/index.js";
