import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import type { Task } from "@nudge/shared/protocol";
import { formatResponse, formatTaskTable } from "./format.js";

const plain = new Chalk({ level: 0 });

const tasks: Task[] = [
  {
    id: "k3v9q2",
    description: "water the plants",
    clock: { type: "daily", hour: 7, minute: 5 },
    createdAt: "2026-10-19T06:00:00.000Z",
  },
  {
    id: "a1",
    description: "stretch",
    clock: { type: "period", everyMs: 5_400_000 },
    createdAt: "2026-10-19T06:30:00.000Z",
  },
  {
    id: "zz7",
    description: "call back",
    clock: { type: "once", at: "2026-10-19T15:45:00.000Z" },
    createdAt: "2026-10-19T07:00:00.000Z",
  },
];

describe("formatTaskTable", () => {
  it("aligns columns to the widest cell", () => {
    expect(formatTaskTable(tasks, 120, plain).split("\n")).toEqual([
      "ID      CLOCK                DESCRIPTION",
      "k3v9q2  daily at 07:05       water the plants",
      "a1      every 5400 secs      stretch",
      "zz7     at 2026-10-19 17:45  call back",
    ]);
  });

  it("says so when nothing is scheduled", () => {
    expect(formatTaskTable([], 0, plain)).toBe("no reminders scheduled");
  });
});

describe("formatResponse", () => {
  it("describes an added task", () => {
    expect(formatResponse({ type: "add_success", task: tasks[0] }, 0, plain)).toBe(
      "added k3v9q2 daily at 07:05: water the plants",
    );
  });

  it("confirms a removal", () => {
    expect(formatResponse({ type: "remove_success", taskId: "a1" }, 0, plain)).toBe("removed a1");
  });
});
