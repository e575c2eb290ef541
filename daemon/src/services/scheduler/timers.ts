/**
 * Timer Behaviors
 *
 * One async routine per live task. Each suspends only at its race point
 * and reports why it ended:
 *   once   : race until the fire time, notify once
 *   period : race a fixed interval, notify, repeat
 *   daily  : race until the next local hour:minute, notify, re-arm
 *
 * Recurring behaviors stop for good on the first delivery failure: they
 * abort their own signal and return "notify_failed". No retry.
 */

import type { ILogger } from "@nudge/shared/logging";
import type { Clock, Task } from "@nudge/shared/protocol";
import { nextDailyOccurrence } from "@nudge/shared/time";
import type { Notifier } from "../../notify/types.js";
import { sleepUntil } from "./race.js";
import { NOTIFICATION_SUMMARY, type FinishReason } from "./types.js";

export interface TimerContext {
  task: Task;
  /** Stop signal owned by the coordinating loop */
  signal: AbortSignal;
  /** Abort this task's own signal */
  stop(): void;
  notifier: Notifier;
  now(): number;
  utcOffsetMinutes: number;
  log: ILogger;
}

export type TimerBehavior = (ctx: TimerContext) => Promise<FinishReason>;

/**
 * Pick the behavior for a clock. Throws synchronously on a clock type this
 * build does not know.
 */
export function selectTimer(clock: Clock): TimerBehavior {
  switch (clock.type) {
    case "once": {
      const at = Date.parse(clock.at);
      return (ctx) => runOnce(ctx, at);
    }
    case "period":
      return (ctx) => runPeriod(ctx, clock.everyMs);
    case "daily":
      return (ctx) => runDaily(ctx, clock.hour, clock.minute);
    default:
      return unknownClock(clock);
  }
}

function unknownClock(clock: never): never {
  throw new Error(`unknown clock type: ${JSON.stringify(clock)}`);
}

// ============================================
// BEHAVIORS
// ============================================

export async function runOnce(ctx: TimerContext, at: number): Promise<FinishReason> {
  if (!Number.isFinite(at) || at <= ctx.now()) {
    ctx.log.warn("Fire time is in the past, nothing scheduled", { at: ctx.task.clock });
    return "expired";
  }

  const outcome = await sleepUntil(at, ctx.signal, ctx.now);
  if (outcome === "cancelled") {
    ctx.log.info("One-shot reminder cancelled", { at: new Date(at).toISOString() });
    return "cancelled";
  }

  ctx.log.info("One-shot reminder fired", { description: ctx.task.description });
  return (await deliver(ctx)) ? "fired" : "notify_failed";
}

export async function runPeriod(ctx: TimerContext, everyMs: number): Promise<FinishReason> {
  for (;;) {
    const outcome = await sleepUntil(ctx.now() + everyMs, ctx.signal, ctx.now);
    if (outcome === "cancelled") {
      ctx.log.info("Periodic reminder cancelled", { everyMs });
      return "cancelled";
    }

    ctx.log.info("Periodic reminder fired", { everyMs, description: ctx.task.description });
    if (!(await deliver(ctx))) {
      ctx.stop();
      return "notify_failed";
    }
  }
}

export async function runDaily(ctx: TimerContext, hour: number, minute: number): Promise<FinishReason> {
  let after = ctx.now();

  for (;;) {
    const next = nextDailyOccurrence(hour, minute, after, ctx.utcOffsetMinutes);
    ctx.log.debug("Daily reminder armed", { next: new Date(next).toISOString() });

    const outcome = await sleepUntil(next, ctx.signal, ctx.now);
    if (outcome === "cancelled") {
      ctx.log.info("Daily reminder cancelled", { hour, minute });
      return "cancelled";
    }

    ctx.log.info("Daily reminder fired", { hour, minute, description: ctx.task.description });
    if (!(await deliver(ctx))) {
      ctx.stop();
      return "notify_failed";
    }

    // Never earlier than the occurrence just served: one fire per day
    after = Math.max(ctx.now(), next);
  }
}

// ============================================
// DELIVERY
// ============================================

async function deliver(ctx: TimerContext): Promise<boolean> {
  try {
    await ctx.notifier.notify({
      summary: NOTIFICATION_SUMMARY,
      body: ctx.task.description,
      image: ctx.task.imagePath,
      sound: ctx.task.soundPath,
    });
    return true;
  } catch (error) {
    ctx.log.error("Failed to deliver notification", error);
    return false;
  }
}
