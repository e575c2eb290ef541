/**
 * Wall Clock
 *
 * Local time is modelled as UTC shifted by a fixed offset (minutes east of
 * UTC) captured once at startup. No timezone database, no DST transitions.
 */

import { ConfigurationError } from "../errors.js";
import { DAY_MS, MINUTE_MS } from "./duration.js";

export interface TimeOfDay {
  hour: number;   // 0-23
  minute: number; // 0-59
}

/**
 * Offset of the host's local time from UTC, in minutes east of UTC.
 * `Date#getTimezoneOffset` reports minutes *west*, hence the sign flip.
 */
export function currentUtcOffsetMinutes(at: Date = new Date()): number {
  return -at.getTimezoneOffset();
}

/**
 * Local hour and minute of an instant. Wraps correctly across midnight in
 * both directions because the shift happens on the absolute timestamp.
 */
export function localTimeOfDay(instantMs: number, offsetMinutes: number): TimeOfDay {
  const local = new Date(instantMs + offsetMinutes * MINUTE_MS);
  return { hour: local.getUTCHours(), minute: local.getUTCMinutes() };
}

/**
 * The first instant strictly after `afterMs` whose local time is hour:minute
 * (seconds and milliseconds zero).
 */
export function nextDailyOccurrence(
  hour: number,
  minute: number,
  afterMs: number,
  offsetMinutes: number,
): number {
  const offsetMs = offsetMinutes * MINUTE_MS;
  const localAfter = afterMs + offsetMs;
  const localMidnight = Math.floor(localAfter / DAY_MS) * DAY_MS;

  let candidate = localMidnight + (hour * 60 + minute) * MINUTE_MS;
  if (candidate <= localAfter) {
    candidate += DAY_MS;
  }
  return candidate - offsetMs;
}

export function assertTimeOfDay(hour: number, minute: number, input: string): void {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new ConfigurationError(`invalid hour ${hour}; expected 0-23`, input);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new ConfigurationError(`invalid minute ${minute}; expected 0-59`, input);
  }
}

/**
 * Parse "H:MM" / "HH:MM" into a time of day.
 */
export function parseTimeOfDay(text: string): TimeOfDay {
  const match = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    throw new ConfigurationError("invalid time! correct examples: 9:30, 23:01", text);
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  assertTimeOfDay(hour, minute, text);
  return { hour, minute };
}

export interface ParsedAt extends TimeOfDay {
  /** Absolute instant (epoch ms) of the next occurrence */
  at: number;
  /** True when today's occurrence had passed and tomorrow's was taken */
  rolledOver: boolean;
}

/**
 * Resolve "HH:MM" to its next occurrence in local time.
 */
export function parseAt(text: string, nowMs: number, offsetMinutes: number): ParsedAt {
  const { hour, minute } = parseTimeOfDay(text);
  const at = nextDailyOccurrence(hour, minute, nowMs, offsetMinutes);
  return { hour, minute, at, rolledOver: localDayNumber(at, offsetMinutes) > localDayNumber(nowMs, offsetMinutes) };
}

function localDayNumber(instantMs: number, offsetMinutes: number): number {
  return Math.floor((instantMs + offsetMinutes * MINUTE_MS) / DAY_MS);
}

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

/** "HH:MM" */
export function formatTimeOfDay(hour: number, minute: number): string {
  return `${pad2(hour)}:${pad2(minute)}`;
}

/** "YYYY-MM-DD HH:MM" in local time */
export function formatLocalDateTime(instantMs: number, offsetMinutes: number): string {
  const local = new Date(instantMs + offsetMinutes * MINUTE_MS);
  const date = `${local.getUTCFullYear()}-${pad2(local.getUTCMonth() + 1)}-${pad2(local.getUTCDate())}`;
  return `${date} ${formatTimeOfDay(local.getUTCHours(), local.getUTCMinutes())}`;
}
