/**
 * Scheduler Types
 */

import type { Task } from "@nudge/shared/protocol";
import type { Notifier } from "../../notify/types.js";

// ============================================
// CONSTANTS
// ============================================

/** Backpressure bound of the command mailbox between callers and the loop */
export const DEFAULT_MAILBOX_CAPACITY = 8;

/** Summary line of every reminder notification */
export const NOTIFICATION_SUMMARY = "nudge";

// ============================================
// COMMANDS
// ============================================

/** Why a timer behavior ended */
export type FinishReason =
  | "cancelled"      // stop signal observed
  | "fired"          // one-shot delivered
  | "expired"        // one-shot fire time already in the past
  | "notify_failed"  // delivery failed; recurring schedules stop for good
  | "crashed";       // timer behavior rejected unexpectedly

export type SchedulerCommand =
  | { type: "add"; task: Task }
  | { type: "cancel"; taskId: string }
  /** Posted by a timer behavior that ended on its own */
  | { type: "finished"; taskId: string; controller: AbortController; reason: FinishReason };

export type TaskFinishedListener = (taskId: string, reason: FinishReason) => void;

// ============================================
// OPTIONS
// ============================================

export interface SchedulerOptions {
  notifier: Notifier;
  /** Default: DEFAULT_MAILBOX_CAPACITY */
  mailboxCapacity?: number;
  /** Minutes east of UTC. Default: the host offset at construction time */
  utcOffsetMinutes?: number;
  /** Epoch-ms clock. Default: Date.now */
  now?: () => number;
}
