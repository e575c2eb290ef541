/**
 * Duration Parsing
 *
 * Compact durations such as "1d1h1m1s", "2h", "30s", "55m".
 */

import { ConfigurationError } from "../errors.js";

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60_000;
export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

const DURATION_PATTERN = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

/**
 * Parse a compact duration into milliseconds.
 * An empty string parses to 0; callers that need a positive duration check it.
 */
export function parseDuration(text: string): number {
  const match = text.trim().match(DURATION_PATTERN);
  if (!match) {
    throw new ConfigurationError(
      "invalid duration format; valid examples: 1d1h1m1s, 2h, 30s, 55m",
      text,
    );
  }

  const [days, hours, minutes, seconds] = match.slice(1).map(part => (part ? parseInt(part, 10) : 0));
  return days * DAY_MS + hours * HOUR_MS + minutes * MINUTE_MS + seconds * SECOND_MS;
}

/**
 * Parse a duration that must be longer than zero (periods, "after" delays).
 */
export function parsePositiveDuration(text: string, what: string): number {
  const ms = parseDuration(text);
  if (ms <= 0) {
    throw new ConfigurationError(`${what} <duration> should not be 0`, text);
  }
  return ms;
}
