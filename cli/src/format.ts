/**
 * Output Formatting
 */

import chalk, { type ChalkInstance } from "chalk";
import { describeClock, type Response, type Task } from "@nudge/shared/protocol";

const HEADERS = ["ID", "CLOCK", "DESCRIPTION"] as const;

/**
 * Plain-text table of tasks, one row per task, columns padded to the
 * widest cell.
 */
export function formatTaskTable(tasks: Task[], utcOffsetMinutes: number, paint: ChalkInstance = chalk): string {
  if (tasks.length === 0) {
    return paint.dim("no reminders scheduled");
  }

  const rows = tasks.map((task) => [task.id, describeClock(task.clock, utcOffsetMinutes), task.description]);
  const widths = HEADERS.map((header, col) => Math.max(header.length, ...rows.map((row) => row[col].length)));
  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col])))
      .join("  ");

  return [paint.bold(line(HEADERS)), ...rows.map((row) => line(row))].join("\n");
}

/**
 * Success output for a daemon response. `fail` responses are errors and
 * never reach here.
 */
export function formatResponse(
  response: Exclude<Response, { type: "fail" }>,
  utcOffsetMinutes: number,
  paint: ChalkInstance = chalk,
): string {
  switch (response.type) {
    case "add_success": {
      const { task } = response;
      return `${paint.green("added")} ${paint.cyan(task.id)} ${describeClock(task.clock, utcOffsetMinutes)}: ${task.description}`;
    }
    case "remove_success":
      return `${paint.green("removed")} ${paint.cyan(response.taskId)}`;
    case "tasks":
      return formatTaskTable(response.tasks, utcOffsetMinutes, paint);
  }
}
