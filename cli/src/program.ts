/**
 * Command Definitions
 *
 *   nudge add <description> after <duration>
 *   nudge add <description> at <HH:MM> [--per-day]
 *   nudge add <description> per <duration>
 *   nudge rm <taskId>
 *   nudge list
 */

import { Argument, Command } from "commander";
import type { ChalkInstance } from "chalk";
import type { ILogger } from "@nudge/shared/logging";
import type { Request, Response } from "@nudge/shared/protocol";
import { formatTimeOfDay, localTimeOfDay } from "@nudge/shared/time";
import type { CliConfig } from "./config.js";
import { formatResponse } from "./format.js";
import { ADD_MODES, buildAddRequest, buildCancelRequest, buildListRequest, type AddOptions } from "./requests.js";

/** The daemon answered with `fail`. */
export class RequestFailedError extends Error {
  constructor(readonly request: Request["type"], readonly reason: string) {
    super(`${request} failed: ${reason}`);
    this.name = "RequestFailedError";
  }
}

export interface ProgramDeps {
  config: CliConfig;
  send(request: Request): Promise<Response>;
  now(): number;
  utcOffsetMinutes: number;
  print(text: string): void;
  log: ILogger;
  /** Default: chalk with detected color support */
  paint?: ChalkInstance;
}

export function createProgram(deps: ProgramDeps): Command {
  async function dispatch(request: Request): Promise<void> {
    deps.log.debug("Sending request", { request: request.type });
    const response = await deps.send(request);
    if (response.type === "fail") {
      throw new RequestFailedError(request.type, response.reason);
    }
    deps.print(formatResponse(response, deps.utcOffsetMinutes, deps.paint));
  }

  const program = new Command()
    .name("nudge")
    .description("Desktop reminders, scheduled by a local daemon")
    .version("0.1.0")
    .option("-v, --verbose", "log debug output to stderr");

  program
    .command("add")
    .description("schedule a reminder")
    .argument("<description>", "text shown in the notification")
    .addArgument(new Argument("<mode>", "when to fire").choices(ADD_MODES))
    .argument("<value>", "duration such as 1d2h3m4s, or a time of day such as 9:30")
    .option("-p, --per-day", "with `at`: repeat every day")
    .option("-i, --image-path <path>", "image shown with the notification")
    .option("-s, --sound-path <path>", "sound played with the notification")
    .action(async (description: string, mode: string, value: string, options: AddOptions) => {
      const now = deps.now();
      const { request, rolledOver } = buildAddRequest(description, mode, value, options, {
        now,
        utcOffsetMinutes: deps.utcOffsetMinutes,
        defaults: { imagePath: deps.config.imagePath, soundPath: deps.config.soundPath },
      });
      if (rolledOver) {
        const { hour, minute } = localTimeOfDay(now, deps.utcOffsetMinutes);
        deps.log.warn(`${value} has already passed today (now ${formatTimeOfDay(hour, minute)}); scheduling for tomorrow`);
      }
      await dispatch(request);
    });

  program
    .command("rm")
    .description("cancel a reminder")
    .argument("<taskId>", "id shown by `add` and `list`")
    .action(async (taskId: string) => {
      await dispatch(buildCancelRequest(taskId));
    });

  program
    .command("list")
    .description("show scheduled reminders")
    .action(async () => {
      await dispatch(buildListRequest());
    });

  return program;
}
