/**
 * Task Registry
 *
 * What the daemon can list and cancel: every task it accepted that has not
 * been cancelled or finished. The scheduler's cancellation registry stays
 * private to its loop; this one only describes tasks.
 */

import type { Task } from "@nudge/shared/protocol";

export class TaskRegistry {
  private readonly tasks = new Map<string, Task>();

  add(task: Task): void {
    this.tasks.set(task.id, task);
  }

  /** Returns the removed task, if it was known */
  remove(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    this.tasks.delete(taskId);
    return task;
  }

  get(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  /** Oldest first */
  list(): Task[] {
    return [...this.tasks.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  get size(): number {
    return this.tasks.size;
  }
}
