import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { Chalk } from "chalk";
import { Logger } from "@nudge/shared/logging";
import type { Request, Response } from "@nudge/shared/protocol";
import { createProgram, RequestFailedError } from "./program.js";

const NOW = Date.parse("2026-10-19T08:00:00Z");

describe("nudge program", () => {
  let send: Mock<(request: Request) => Promise<Response>>;
  let print: Mock<(text: string) => void>;
  let log: Logger;

  function run(...args: string[]): Promise<unknown> {
    const program = createProgram({
      config: { address: { host: "127.0.0.1", port: 8082 }, soundPath: "Ping" },
      send,
      now: () => NOW,
      utcOffsetMinutes: 0,
      print,
      log,
      paint: new Chalk({ level: 0 }),
    });
    for (const command of [program, ...program.commands]) {
      command.exitOverride();
      command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    }
    return program.parseAsync(["node", "nudge", ...args]);
  }

  beforeEach(() => {
    send = vi.fn<(request: Request) => Promise<Response>>();
    print = vi.fn<(text: string) => void>();
    log = new Logger({ minLevel: "silent", component: "test", transports: [] });
  });

  it("adds a one-shot reminder after a delay", async () => {
    send.mockImplementation(async (request) => {
      if (request.type !== "add") throw new Error("unexpected request");
      return {
        type: "add_success",
        task: { id: "abc", description: request.description, clock: request.clock, createdAt: "2026-10-19T08:00:00.000Z" },
      };
    });

    await run("add", "tea", "after", "10m");

    expect(send).toHaveBeenCalledWith({
      type: "add",
      description: "tea",
      clock: { type: "once", at: "2026-10-19T08:10:00.000Z" },
      imagePath: undefined,
      soundPath: "Ping",
    });
    expect(print).toHaveBeenCalledWith("added abc at 2026-10-19 08:10: tea");
  });

  it("adds a daily reminder with --per-day and explicit media", async () => {
    send.mockResolvedValue({ type: "tasks", tasks: [] });

    await run("add", "standup", "at", "9:15", "--per-day", "-i", "/img/sun.png", "-s", "Glass");

    expect(send).toHaveBeenCalledWith({
      type: "add",
      description: "standup",
      clock: { type: "daily", hour: 9, minute: 15 },
      imagePath: "/img/sun.png",
      soundPath: "Glass",
    });
  });

  it("warns when an `at` time rolls over to tomorrow", async () => {
    send.mockResolvedValue({ type: "tasks", tasks: [] });
    const warn = vi.spyOn(log, "warn");

    await run("add", "call", "at", "7:30");

    expect(warn).toHaveBeenCalledWith("7:30 has already passed today (now 08:00); scheduling for tomorrow");
    expect(send.mock.calls[0][0]).toMatchObject({ clock: { type: "once", at: "2026-10-20T07:30:00.000Z" } });
  });

  it("rejects a mode commander does not know", async () => {
    await expect(run("add", "tea", "every", "10m")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
    expect(send).not.toHaveBeenCalled();
  });

  it("does not contact the daemon for an invalid duration", async () => {
    await expect(run("add", "tea", "per", "0s")).rejects.toThrow("per <duration> should not be 0");
    expect(send).not.toHaveBeenCalled();
  });

  it("cancels by id", async () => {
    send.mockResolvedValue({ type: "remove_success", taskId: "abc" });

    await run("rm", "abc");

    expect(send).toHaveBeenCalledWith({ type: "cancel", taskId: "abc" });
    expect(print).toHaveBeenCalledWith("removed abc");
  });

  it("turns a fail response into an error", async () => {
    send.mockResolvedValue({ type: "fail", reason: "no such task" });

    const result = run("rm", "missing");

    await expect(result).rejects.toBeInstanceOf(RequestFailedError);
    await expect(result).rejects.toThrow("cancel failed: no such task");
    expect(print).not.toHaveBeenCalled();
  });

  it("lists tasks as a table", async () => {
    send.mockResolvedValue({
      type: "tasks",
      tasks: [{ id: "abc", description: "tea", clock: { type: "period", everyMs: 60_000 }, createdAt: "2026-10-19T07:00:00.000Z" }],
    });

    await run("list");

    expect(send).toHaveBeenCalledWith({ type: "list" });
    expect(print).toHaveBeenCalledWith("ID   CLOCK          DESCRIPTION\nabc  every 60 secs  tea");
  });
});
