#!/usr/bin/env node
/**
 * nudge CLI
 *
 * Sends one request to the daemon and prints the answer.
 */

import chalk from "chalk";
import { currentUtcOffsetMinutes } from "@nudge/shared/time";
import { sendRequest } from "./client.js";
import { loadDotEnv, readCliConfig } from "./config.js";
import { initCliLogging } from "./logging.js";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  loadDotEnv();
  const verbose = process.argv.includes("-v") || process.argv.includes("--verbose");
  const log = initCliLogging({ verbose });
  const config = readCliConfig();

  const program = createProgram({
    config,
    send: (request) => sendRequest(request, config.address),
    now: Date.now,
    utcOffsetMinutes: currentUtcOffsetMinutes(),
    print: (text) => console.log(text),
    log,
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
