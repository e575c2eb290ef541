/**
 * Wire Parsing
 *
 * Turns raw message text into typed requests/responses. Anything that does
 * not match the wire shapes raises ProtocolError.
 */

import { ProtocolError } from "../errors.js";
import type { Clock, Request, Response, Task } from "./types.js";

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(raw: string): Fields {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ProtocolError("message is not valid JSON");
  }
  if (!isFields(value)) {
    throw new ProtocolError("message must be a JSON object");
  }
  return value;
}

function requireString(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== "string") {
    throw new ProtocolError(`"${key}" must be a string`);
  }
  return value;
}

function optionalString(fields: Fields, key: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ProtocolError(`"${key}" must be a string`);
  }
  return value;
}

function requireInteger(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ProtocolError(`"${key}" must be an integer`);
  }
  return value;
}

// ============================================
// CLOCKS & TASKS
// ============================================

/**
 * Structural check only; range checks (positive period, valid hour) are the
 * daemon's job.
 */
export function parseClock(value: unknown): Clock {
  if (!isFields(value)) {
    throw new ProtocolError('"clock" must be an object');
  }
  switch (value.type) {
    case "once": {
      const at = requireString(value, "at");
      if (Number.isNaN(Date.parse(at))) {
        throw new ProtocolError(`"at" is not a valid timestamp: ${at}`);
      }
      return { type: "once", at };
    }
    case "period":
      return { type: "period", everyMs: requireInteger(value, "everyMs") };
    case "daily":
      return { type: "daily", hour: requireInteger(value, "hour"), minute: requireInteger(value, "minute") };
    default:
      throw new ProtocolError(`unknown clock type: ${String(value.type)}`);
  }
}

function parseTask(value: unknown): Task {
  if (!isFields(value)) {
    throw new ProtocolError("task must be an object");
  }
  return {
    id: requireString(value, "id"),
    description: requireString(value, "description"),
    clock: parseClock(value.clock),
    createdAt: requireString(value, "createdAt"),
    imagePath: optionalString(value, "imagePath"),
    soundPath: optionalString(value, "soundPath"),
  };
}

// ============================================
// MESSAGES
// ============================================

export function parseRequest(raw: string): Request {
  const fields = parseJson(raw);
  switch (fields.type) {
    case "add":
      return {
        type: "add",
        description: requireString(fields, "description"),
        clock: parseClock(fields.clock),
        imagePath: optionalString(fields, "imagePath"),
        soundPath: optionalString(fields, "soundPath"),
      };
    case "cancel":
      return { type: "cancel", taskId: requireString(fields, "taskId") };
    case "list":
      return { type: "list" };
    default:
      throw new ProtocolError(`unknown request type: ${String(fields.type)}`);
  }
}

export function parseResponse(raw: string): Response {
  const fields = parseJson(raw);
  switch (fields.type) {
    case "add_success":
      return { type: "add_success", task: parseTask(fields.task) };
    case "remove_success":
      return { type: "remove_success", taskId: requireString(fields, "taskId") };
    case "tasks": {
      if (!Array.isArray(fields.tasks)) {
        throw new ProtocolError('"tasks" must be an array');
      }
      return { type: "tasks", tasks: fields.tasks.map(parseTask) };
    }
    case "fail":
      return { type: "fail", reason: requireString(fields, "reason") };
    default:
      throw new ProtocolError(`unknown response type: ${String(fields.type)}`);
  }
}
