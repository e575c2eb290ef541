/**
 * nudge daemon - Main Entry Point
 *
 * Owns the scheduler and answers CLI requests over WebSocket until it is
 * told to stop.
 */

import { loadDotEnv, readDaemonConfig } from "./config.js";
import { initDaemonLogging } from "./logging.js";
import { createDesktopNotifier } from "./notify/index.js";
import { ReminderScheduler } from "./services/scheduler/index.js";
import { TaskRegistry } from "./tasks/registry.js";
import { createRequestHandler } from "./ws/handler.js";
import { createDaemonServer } from "./ws/server.js";

async function main(): Promise<void> {
  loadDotEnv();
  const config = readDaemonConfig();
  const logger = initDaemonLogging({ minLevel: config.logLevel, logDir: config.logDir });
  const log = logger.child({ component: "daemon.main" });

  const registry = new TaskRegistry();
  const scheduler = new ReminderScheduler({
    notifier: createDesktopNotifier(),
    mailboxCapacity: config.mailboxCapacity,
    utcOffsetMinutes: config.utcOffsetMinutes,
  });

  // Finished tasks leave the listing; cancelled ones are removed by the handler
  scheduler.onTaskFinished((taskId, reason) => {
    if (registry.remove(taskId)) {
      log.info("Task finished", { taskId, reason });
    }
  });

  const server = await createDaemonServer({
    host: config.address.host,
    port: config.address.port,
    handler: createRequestHandler({ scheduler, registry }),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down`);
    try {
      await server.close();
      await scheduler.shutdown();
    } catch (error) {
      log.error("Error during shutdown", error);
      process.exitCode = 1;
    }
    await logger.close();
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start the nudge daemon:", error instanceof Error ? error.message : error);
  process.exit(1);
});
