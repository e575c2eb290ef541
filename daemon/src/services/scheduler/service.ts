/**
 * Reminder Scheduler: Facade
 *
 * Public entry point. Callers hand tasks over through a bounded mailbox;
 * a single coordinating loop, started by the constructor, owns everything
 * else. `addTask` / `cancelTask` resolve once the command is queued, not
 * once it has been processed, and wait while the mailbox is full.
 */

import { currentUtcOffsetMinutes } from "@nudge/shared/time";
import type { Task } from "@nudge/shared/protocol";
import { createComponentLogger } from "../../logging.js";
import { SchedulerUnavailableError } from "./errors.js";
import { CoordinatingLoop } from "./loop.js";
import { Mailbox, MailboxClosedError } from "./mailbox.js";
import {
  DEFAULT_MAILBOX_CAPACITY,
  type FinishReason,
  type SchedulerCommand,
  type SchedulerOptions,
  type TaskFinishedListener,
} from "./types.js";

export class ReminderScheduler {
  readonly mailboxCapacity: number;
  /** Local offset captured once; every daily computation uses it */
  readonly utcOffsetMinutes: number;

  private readonly mailbox: Mailbox<SchedulerCommand>;
  private readonly loop: CoordinatingLoop;
  private readonly stopped: Promise<void>;
  private readonly finishedListeners: TaskFinishedListener[] = [];
  private readonly log = createComponentLogger("scheduler");

  constructor(options: SchedulerOptions) {
    this.mailboxCapacity = options.mailboxCapacity ?? DEFAULT_MAILBOX_CAPACITY;
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? currentUtcOffsetMinutes();
    this.mailbox = new Mailbox<SchedulerCommand>(this.mailboxCapacity);

    this.loop = new CoordinatingLoop(this.mailbox, {
      notifier: options.notifier,
      now: options.now ?? Date.now,
      utcOffsetMinutes: this.utcOffsetMinutes,
      log: this.log,
      onFinished: (taskId, reason) => this.emitFinished(taskId, reason),
    });

    this.stopped = this.loop.run().catch((error: unknown) => {
      this.log.fatal("Scheduler loop crashed; scheduler is unavailable", error);
    });

    this.log.info("Scheduler started", {
      mailboxCapacity: this.mailboxCapacity,
      utcOffsetMinutes: this.utcOffsetMinutes,
    });
  }

  // ============================================
  // PUBLIC API
  // ============================================

  /**
   * Schedule a task. The clock must already be validated.
   */
  async addTask(task: Task): Promise<void> {
    await this.submit({ type: "add", task });
    this.log.debug("Task handed to scheduler loop", { taskId: task.id, clock: task.clock.type });
  }

  /**
   * Ask the loop to stop a task. Unknown or already finished tasks are not
   * an error.
   */
  async cancelTask(task: Task): Promise<void> {
    await this.submit({ type: "cancel", taskId: task.id });
    this.log.debug("Cancellation handed to scheduler loop", { taskId: task.id });
  }

  /**
   * Register a listener for tasks that end on their own
   * (fired, expired, notify_failed, crashed).
   */
  onTaskFinished(listener: TaskFinishedListener): void {
    this.finishedListeners.push(listener);
  }

  isAvailable(): boolean {
    return !this.mailbox.isClosed;
  }

  /** Ids currently holding a registry entry */
  liveTaskIds(): string[] {
    return this.loop.liveTaskIds();
  }

  /**
   * Close the mailbox, stop every live task and wait for the loop to exit.
   */
  async shutdown(): Promise<void> {
    this.mailbox.close();
    await this.stopped;
    this.log.info("Scheduler stopped");
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async submit(command: SchedulerCommand): Promise<void> {
    if (this.mailbox.isClosed) {
      throw new SchedulerUnavailableError();
    }
    try {
      await this.mailbox.send(command);
    } catch (error) {
      if (error instanceof MailboxClosedError) {
        throw new SchedulerUnavailableError();
      }
      throw error;
    }
  }

  private emitFinished(taskId: string, reason: FinishReason): void {
    for (const listener of this.finishedListeners) {
      try {
        listener(taskId, reason);
      } catch (error) {
        this.log.error("Task finished listener error", error, { taskId });
      }
    }
  }
}
