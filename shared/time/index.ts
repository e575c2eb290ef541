/**
 * Time Module
 *
 * Duration and time-of-day parsing, fixed-offset wall clock arithmetic.
 */

export {
  SECOND_MS,
  MINUTE_MS,
  HOUR_MS,
  DAY_MS,
  parseDuration,
  parsePositiveDuration,
} from "./duration.js";

export {
  currentUtcOffsetMinutes,
  localTimeOfDay,
  nextDailyOccurrence,
  assertTimeOfDay,
  parseTimeOfDay,
  parseAt,
  formatTimeOfDay,
  formatLocalDateTime,
  type TimeOfDay,
  type ParsedAt,
} from "./wall-clock.js";
