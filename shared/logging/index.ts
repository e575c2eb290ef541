/**
 * Logging
 * 
 * Usage:
 * 
 * ```typescript
 * import { initLogger, ConsoleTransport, FileTransport } from "@nudge/shared/logging";
 * 
 * // Initialize once at startup
 * const logger = initLogger({
 *   minLevel: "debug",
 *   component: "daemon",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.nudge/logs" })
 *   ]
 * });
 * 
 * // Namespaced child logger for one component
 * const schedulerLog = logger.child({ component: "daemon.scheduler" });
 * schedulerLog.info("Task added", { clock: "every 60 secs" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
