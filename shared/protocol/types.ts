/**
 * Wire Types
 *
 * Shapes exchanged between the CLI and the daemon, one JSON document per
 * WebSocket message. The daemon uses the same Task shape internally.
 */

// ============================================
// TASKS
// ============================================

/** Firing rule of a reminder */
export type Clock =
  /** Fire once at an absolute instant (ISO 8601) */
  | { type: "once"; at: string }
  /** Fire every `everyMs` until cancelled */
  | { type: "period"; everyMs: number }
  /** Fire once a day at local hour:minute until cancelled */
  | { type: "daily"; hour: number; minute: number };

export type ClockType = Clock["type"];

export interface Task {
  id: string;
  description: string;
  clock: Clock;
  createdAt: string;     // ISO 8601, metadata only
  imagePath?: string;
  soundPath?: string;
}

// ============================================
// REQUESTS
// ============================================

export interface AddRequest {
  type: "add";
  description: string;
  clock: Clock;
  imagePath?: string;
  soundPath?: string;
}

export interface CancelRequest {
  type: "cancel";
  taskId: string;
}

export interface ListRequest {
  type: "list";
}

export type Request = AddRequest | CancelRequest | ListRequest;

// ============================================
// RESPONSES
// ============================================

export type Response =
  | { type: "add_success"; task: Task }
  | { type: "remove_success"; taskId: string }
  | { type: "tasks"; tasks: Task[] }
  | { type: "fail"; reason: string };
