/**
 * Request Handler
 *
 * Turns one parsed client request into one response. Validation failures
 * and an unavailable scheduler become `fail` responses; nothing here
 * throws back into the connection.
 */

import { customAlphabet } from "nanoid";
import { ConfigurationError, ProtocolError } from "@nudge/shared/errors";
import type { ILogger } from "@nudge/shared/logging";
import {
  describeClock,
  parseRequest,
  type AddRequest,
  type Clock,
  type Request,
  type Response,
  type Task,
} from "@nudge/shared/protocol";
import { assertTimeOfDay } from "@nudge/shared/time";
import type { ReminderScheduler } from "../services/scheduler/index.js";
import { SchedulerUnavailableError } from "../services/scheduler/index.js";
import type { TaskRegistry } from "../tasks/registry.js";

/** Lowercase alphanumerics only, so ids never look like CLI flags */
const newTaskId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 10);

export type TaskScheduler = Pick<ReminderScheduler, "addTask" | "cancelTask" | "utcOffsetMinutes">;

export interface RequestHandlerDeps {
  scheduler: TaskScheduler;
  registry: TaskRegistry;
  now?: () => number;
  generateId?: () => string;
}

export type RequestHandler = (request: Request, log: ILogger) => Promise<Response>;

function fail(reason: string): Response {
  return { type: "fail", reason };
}

/**
 * Range checks the wire parser leaves to the daemon.
 */
export function validateClock(clock: Clock): void {
  switch (clock.type) {
    case "once":
      return;
    case "period":
      if (clock.everyMs <= 0) {
        throw new ConfigurationError("period should be greater than 0", String(clock.everyMs));
      }
      return;
    case "daily":
      assertTimeOfDay(clock.hour, clock.minute, `${clock.hour}:${clock.minute}`);
      return;
  }
}

export function createRequestHandler(deps: RequestHandlerDeps): RequestHandler {
  const { scheduler, registry } = deps;
  const now = deps.now ?? Date.now;
  const generateId = deps.generateId ?? newTaskId;

  async function add(request: AddRequest, log: ILogger): Promise<Response> {
    validateClock(request.clock);

    const task: Task = {
      id: generateId(),
      description: request.description,
      clock: request.clock,
      createdAt: new Date(now()).toISOString(),
      imagePath: request.imagePath,
      soundPath: request.soundPath,
    };

    registry.add(task);
    try {
      await scheduler.addTask(task);
    } catch (error) {
      registry.remove(task.id);
      throw error;
    }

    log.info("Task accepted", {
      taskId: task.id,
      clock: describeClock(task.clock, scheduler.utcOffsetMinutes),
    });
    return { type: "add_success", task };
  }

  async function cancel(taskId: string, log: ILogger): Promise<Response> {
    const task = registry.get(taskId);
    if (!task) {
      log.warn("Cancel for unknown task", { taskId });
      return fail("no such task");
    }

    await scheduler.cancelTask(task);
    registry.remove(taskId);
    log.info("Task removed", { taskId });
    return { type: "remove_success", taskId };
  }

  return async (request, log) => {
    try {
      switch (request.type) {
        case "add":
          return await add(request, log);
        case "cancel":
          return await cancel(request.taskId, log);
        case "list":
          return { type: "tasks", tasks: registry.list() };
      }
    } catch (error) {
      if (error instanceof ConfigurationError || error instanceof SchedulerUnavailableError) {
        log.warn("Request rejected", { request: request.type, reason: error.message });
        return fail(error.message);
      }
      log.error("Request failed", error, { request: request.type });
      return fail("internal error");
    }
  };
}

/**
 * Parse one raw message and answer it. Malformed messages get a `fail`.
 */
export async function respond(raw: string, handler: RequestHandler, log: ILogger): Promise<Response> {
  let request: Request;
  try {
    request = parseRequest(raw);
  } catch (error) {
    if (error instanceof ProtocolError) {
      log.warn("Malformed request", { reason: error.message });
      return fail(error.message);
    }
    throw error;
  }
  return handler(request, log);
}
