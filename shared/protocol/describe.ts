import { formatLocalDateTime, formatTimeOfDay } from "../time/index.js";
import type { Clock } from "./types.js";

/**
 * Human-readable firing rule: "at 2026-10-19 09:30", "every 90 secs",
 * "daily at 07:05".
 */
export function describeClock(clock: Clock, offsetMinutes: number): string {
  switch (clock.type) {
    case "once":
      return `at ${formatLocalDateTime(Date.parse(clock.at), offsetMinutes)}`;
    case "period":
      return `every ${Math.floor(clock.everyMs / 1000)} secs`;
    case "daily":
      return `daily at ${formatTimeOfDay(clock.hour, clock.minute)}`;
  }
}
