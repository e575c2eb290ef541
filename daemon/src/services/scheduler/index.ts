/**
 * Scheduler: Barrel Exports
 *
 * Structure:
 *   types.ts   : commands, finish reasons, options
 *   errors.ts  : SchedulerUnavailableError
 *   mailbox.ts : bounded command channel
 *   race.ts    : timer vs. stop-signal race
 *   timers.ts  : once / period / daily behaviors
 *   loop.ts    : coordinating loop, owns the cancellation registry
 *   service.ts : public facade
 */

export { ReminderScheduler } from "./service.js";
export { SchedulerUnavailableError } from "./errors.js";
export {
  DEFAULT_MAILBOX_CAPACITY,
  NOTIFICATION_SUMMARY,
  type FinishReason,
  type SchedulerOptions,
  type TaskFinishedListener,
} from "./types.js";
