/**
 * Logging Setup for the CLI
 *
 * Console only, on stderr, so stdout carries nothing but command output.
 */

import { initLogger, ConsoleTransport, type Logger, type LogLevel } from "@nudge/shared/logging";

let logger: Logger | null = null;

export function initCliLogging(options: { verbose?: boolean } = {}): Logger {
  const minLevel: LogLevel = process.env.NODE_ENV === "test" ? "silent" : options.verbose ? "debug" : "warn";

  logger = initLogger({
    minLevel,
    component: "cli",
    transports: [new ConsoleTransport({ minLevel, stderrOnly: true, timestamps: false, prettyPrint: false })],
  });
  return logger;
}

export function getCliLogger(): Logger {
  return logger ?? initCliLogging();
}
