/**
 * Request Builders
 *
 * Turn command-line arguments into wire requests. Pure: the current time
 * and UTC offset are passed in.
 */

import { ConfigurationError } from "@nudge/shared/errors";
import type { AddRequest, CancelRequest, Clock, ListRequest } from "@nudge/shared/protocol";
import { parseAt, parsePositiveDuration } from "@nudge/shared/time";

export const ADD_MODES = ["after", "at", "per"] as const;
export type AddMode = (typeof ADD_MODES)[number];

export function isAddMode(value: string): value is AddMode {
  return ADD_MODES.some((mode) => mode === value);
}

export interface AddOptions {
  perDay?: boolean;
  imagePath?: string;
  soundPath?: string;
}

export interface BuildContext {
  now: number;
  utcOffsetMinutes: number;
  /** Media used when the options name none */
  defaults: { imagePath?: string; soundPath?: string };
}

export interface BuiltAdd {
  request: AddRequest;
  /** The requested time of day had passed; the reminder is for tomorrow */
  rolledOver: boolean;
}

function resolveClock(
  mode: AddMode,
  value: string,
  perDay: boolean,
  ctx: BuildContext,
): { clock: Clock; rolledOver: boolean } {
  switch (mode) {
    case "after": {
      const at = ctx.now + parsePositiveDuration(value, "after");
      return { clock: { type: "once", at: new Date(at).toISOString() }, rolledOver: false };
    }
    case "per":
      return { clock: { type: "period", everyMs: parsePositiveDuration(value, "per") }, rolledOver: false };
    case "at": {
      const parsed = parseAt(value, ctx.now, ctx.utcOffsetMinutes);
      if (perDay) {
        return { clock: { type: "daily", hour: parsed.hour, minute: parsed.minute }, rolledOver: false };
      }
      return { clock: { type: "once", at: new Date(parsed.at).toISOString() }, rolledOver: parsed.rolledOver };
    }
  }
}

export function buildAddRequest(
  description: string,
  mode: string,
  value: string,
  options: AddOptions,
  ctx: BuildContext,
): BuiltAdd {
  if (!isAddMode(mode)) {
    throw new ConfigurationError(`unknown mode "${mode}"; expected one of: ${ADD_MODES.join(", ")}`, mode);
  }
  if (options.perDay && mode !== "at") {
    throw new ConfigurationError("--per-day only applies to `at`", mode);
  }

  const { clock, rolledOver } = resolveClock(mode, value, options.perDay ?? false, ctx);

  return {
    request: {
      type: "add",
      description,
      clock,
      imagePath: options.imagePath ?? ctx.defaults.imagePath,
      soundPath: options.soundPath ?? ctx.defaults.soundPath,
    },
    rolledOver,
  };
}

export function buildCancelRequest(taskId: string): CancelRequest {
  return { type: "cancel", taskId };
}

export function buildListRequest(): ListRequest {
  return { type: "list" };
}
