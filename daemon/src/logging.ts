/**
 * Logging Setup for the Daemon
 * 
 * Initializes the shared logging system with console and file transports.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  Logger,
  ILogger,
  ConsoleTransport,
  FileTransport,
  LogLevel,
  LogTransport
} from "@nudge/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true outside tests) */
  file?: boolean;
  /** Directory for log files (default: ~/.nudge/logs) */
  logDir?: string;
}

let logger: Logger | null = null;

/**
 * Initialize the logging system for the daemon.
 */
export function initDaemonLogging(options: LoggingOptions = {}): Logger {
  const env = process.env.NODE_ENV;
  const isDev = env !== "production";
  const isTest = env === "test";
  const minLevel = options.minLevel || (isTest ? "silent" : isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      prettyPrint: isDev
    }));
  }

  if (options.file ?? !isTest) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir || path.join(os.homedir(), ".nudge", "logs"),
      filename: "daemon"
    }));
  }

  logger = initLogger({
    minLevel,
    component: "daemon",
    transports
  });

  return logger;
}

/**
 * Get the daemon logger instance. Auto-initializes with defaults if needed.
 */
export function getDaemonLogger(): Logger {
  return logger ?? initDaemonLogging();
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getDaemonLogger().child({ component: `daemon.${component}` });
}
