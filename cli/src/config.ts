/**
 * CLI Configuration
 *
 * Where the daemon listens and the default image/sound for new reminders.
 */

import { config as loadEnv } from "dotenv";
import { existsSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { DEFAULT_DAEMON_ADDR, parseAddress, type DaemonAddress } from "@nudge/shared/protocol";

export interface CliConfig {
  address: DaemonAddress;
  /** Used when `add` gets no --image-path */
  imagePath?: string;
  /** Used when `add` gets no --sound-path */
  soundPath?: string;
}

export function loadDotEnv(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    resolve(here, "..", "..", ".env"),        // cli/src → repo root
    resolve(here, "..", "..", "..", ".env"),  // dist/cli/src → repo root
  ];
  const path = candidates.find((p) => existsSync(p));
  if (path) {
    loadEnv({ path });
  }
}

export function readCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    address: parseAddress(env.NUDGE_DAEMON_ADDR || DEFAULT_DAEMON_ADDR),
    imagePath: env.NUDGE_IMAGE_PATH || undefined,
    soundPath: env.NUDGE_SOUND_PATH || undefined,
  };
}
