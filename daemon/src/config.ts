/**
 * Daemon Configuration
 *
 * Environment variables (optionally from the project root .env), parsed
 * once into a typed object.
 */

import { config as loadEnv } from "dotenv";
import { existsSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { ConfigurationError } from "@nudge/shared/errors";
import { isLogLevel, type LogLevel } from "@nudge/shared/logging";
import { DEFAULT_DAEMON_ADDR, parseAddress, type DaemonAddress } from "@nudge/shared/protocol";
import { currentUtcOffsetMinutes } from "@nudge/shared/time";
import { DEFAULT_MAILBOX_CAPACITY } from "./services/scheduler/types.js";

export interface DaemonConfig {
  address: DaemonAddress;
  /** Scheduler command mailbox size (backpressure bound) */
  mailboxCapacity: number;
  /** Minutes east of UTC; captured at startup unless overridden */
  utcOffsetMinutes: number;
  logLevel?: LogLevel;
  logDir?: string;
}

/**
 * Load .env from the project root. Existing environment variables win.
 */
export function loadDotEnv(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    resolve(here, "..", "..", ".env"),        // daemon/src → repo root
    resolve(here, "..", "..", "..", ".env"),  // dist/daemon/src → repo root
  ];
  const path = candidates.find((p) => existsSync(p));
  if (path) {
    loadEnv({ path });
  }
}

function parseIntegerSetting(name: string, value: string, min: number, max: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}`, value);
  }
  return n;
}

/**
 * Build the daemon configuration from an environment map.
 */
export function readDaemonConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
  const address = parseAddress(env.NUDGE_DAEMON_ADDR || DEFAULT_DAEMON_ADDR);

  const mailboxCapacity = env.NUDGE_MAILBOX_CAPACITY
    ? parseIntegerSetting("NUDGE_MAILBOX_CAPACITY", env.NUDGE_MAILBOX_CAPACITY, 1, 1024)
    : DEFAULT_MAILBOX_CAPACITY;

  const utcOffsetMinutes = env.NUDGE_UTC_OFFSET_MINUTES
    ? parseIntegerSetting("NUDGE_UTC_OFFSET_MINUTES", env.NUDGE_UTC_OFFSET_MINUTES, -720, 840)
    : currentUtcOffsetMinutes();

  let logLevel: LogLevel | undefined;
  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new ConfigurationError(`unknown LOG_LEVEL "${env.LOG_LEVEL}"`, env.LOG_LEVEL);
    }
    logLevel = env.LOG_LEVEL;
  }

  return {
    address,
    mailboxCapacity,
    utcOffsetMinutes,
    logLevel,
    logDir: env.LOG_DIR || undefined,
  };
}
