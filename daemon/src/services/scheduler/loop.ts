/**
 * Coordinating Loop
 *
 * Consumes scheduler commands one at a time and is the only code that
 * touches the cancellation registry (task id → stop controller). Timer
 * behaviors run detached; when one ends on its own it posts a "finished"
 * command back so its registry entry is pruned here, in order with every
 * other mutation.
 */

import type { ILogger } from "@nudge/shared/logging";
import { describeClock, type Task } from "@nudge/shared/protocol";
import type { Notifier } from "../../notify/types.js";
import type { Mailbox } from "./mailbox.js";
import { selectTimer } from "./timers.js";
import type { FinishReason, SchedulerCommand, TaskFinishedListener } from "./types.js";

export interface LoopDeps {
  notifier: Notifier;
  now: () => number;
  utcOffsetMinutes: number;
  log: ILogger;
  onFinished: TaskFinishedListener;
}

export class CoordinatingLoop {
  private readonly registry = new Map<string, AbortController>();

  constructor(
    private readonly mailbox: Mailbox<SchedulerCommand>,
    private readonly deps: LoopDeps,
  ) {}

  /**
   * Run until the mailbox closes. A throw from a command handler ends the
   * loop too; either way the mailbox is closed and every live task stopped.
   */
  async run(): Promise<void> {
    try {
      for (;;) {
        const command = await this.mailbox.receive();
        if (command === null) break;
        this.handle(command);
      }
    } finally {
      this.mailbox.close();
      this.stopAll();
    }
  }

  liveTaskIds(): string[] {
    return [...this.registry.keys()];
  }

  private handle(command: SchedulerCommand): void {
    switch (command.type) {
      case "add":
        this.add(command.task);
        break;
      case "cancel":
        this.cancel(command.taskId);
        break;
      case "finished":
        this.finished(command.taskId, command.controller, command.reason);
        break;
    }
  }

  private add(task: Task): void {
    if (this.registry.has(task.id)) {
      this.deps.log.warn("Task already scheduled, ignoring duplicate add", { taskId: task.id });
      return;
    }

    const behavior = selectTimer(task.clock);
    const controller = new AbortController();
    this.registry.set(task.id, controller);

    const taskLog = this.deps.log.child({ taskId: task.id });
    taskLog.info("Task added", {
      clock: describeClock(task.clock, this.deps.utcOffsetMinutes),
      description: task.description,
    });

    void behavior({
      task,
      signal: controller.signal,
      stop: () => controller.abort(),
      notifier: this.deps.notifier,
      now: this.deps.now,
      utcOffsetMinutes: this.deps.utcOffsetMinutes,
      log: taskLog,
    }).then(
      (reason) => this.reportEnd(task.id, controller, reason),
      (error: unknown) => {
        taskLog.error("Timer behavior crashed", error);
        this.reportEnd(task.id, controller, "crashed");
      },
    );
  }

  private cancel(taskId: string): void {
    const controller = this.registry.get(taskId);
    if (!controller) {
      this.deps.log.warn("No live task to cancel", { taskId });
      return;
    }

    this.registry.delete(taskId);
    if (controller.signal.aborted) {
      // The task stopped itself; its "finished" command is on the way
      this.deps.log.debug("Task had already stopped", { taskId });
      return;
    }
    controller.abort();
    this.deps.log.info("Task cancelled", { taskId });
  }

  private finished(taskId: string, controller: AbortController, reason: FinishReason): void {
    if (this.registry.get(taskId) === controller) {
      this.registry.delete(taskId);
    }
    this.deps.log.debug("Task finished", { taskId, reason });
    this.deps.onFinished(taskId, reason);
  }

  /** Called from a detached timer behavior; defers the mutation to the loop */
  private reportEnd(taskId: string, controller: AbortController, reason: FinishReason): void {
    if (reason === "cancelled") return;
    this.mailbox.post({ type: "finished", taskId, controller, reason });
  }

  private stopAll(): void {
    for (const controller of this.registry.values()) {
      controller.abort();
    }
    this.registry.clear();
  }
}
