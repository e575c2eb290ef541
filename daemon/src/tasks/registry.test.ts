import { describe, it, expect } from "vitest";
import type { Task } from "@nudge/shared/protocol";
import { TaskRegistry } from "./registry.js";

function task(id: string, createdAt: string): Task {
  return { id, description: `task ${id}`, clock: { type: "period", everyMs: 60_000 }, createdAt };
}

describe("TaskRegistry", () => {
  it("lists tasks oldest first", () => {
    const registry = new TaskRegistry();
    registry.add(task("b", "2026-10-19T09:00:00.000Z"));
    registry.add(task("a", "2026-10-19T08:00:00.000Z"));
    registry.add(task("c", "2026-10-19T10:00:00.000Z"));

    expect(registry.list().map((t) => t.id)).toEqual(["a", "b", "c"]);
    expect(registry.size).toBe(3);
  });

  it("returns the removed task once", () => {
    const registry = new TaskRegistry();
    const t = task("a", "2026-10-19T08:00:00.000Z");
    registry.add(t);

    expect(registry.remove("a")).toEqual(t);
    expect(registry.remove("a")).toBeUndefined();
    expect(registry.get("a")).toBeUndefined();
    expect(registry.list()).toEqual([]);
  });
});
