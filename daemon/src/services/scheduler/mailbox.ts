/**
 * Bounded Mailbox
 *
 * FIFO channel with a single consumer. `send` resolves as soon as the item
 * is queued; while the queue holds `capacity` items, senders wait.
 * Closing drops queued items, rejects waiting senders and wakes the
 * consumer with `null`.
 */

export class MailboxClosedError extends Error {
  constructor() {
    super("mailbox is closed");
    this.name = "MailboxClosedError";
  }
}

interface BlockedSender<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Mailbox<T> {
  private queue: T[] = [];
  private blocked: BlockedSender<T>[] = [];
  private waitingReceiver: ((item: T | null) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`mailbox capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items queued and not yet received */
  get size(): number {
    return this.queue.length;
  }

  /** Senders waiting for room */
  get pendingSenders(): number {
    return this.blocked.length;
  }

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new MailboxClosedError());
    }
    if (this.deliver(item)) {
      return Promise.resolve();
    }
    if (this.queue.length < this.capacity) {
      this.queue.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.blocked.push({ item, resolve, reject });
    });
  }

  /**
   * Queue an item regardless of capacity. Used by the consumer's own side
   * (never by outside callers), so it can never deadlock on itself.
   * Returns false when the mailbox is closed.
   */
  post(item: T): boolean {
    if (this.closed) return false;
    if (!this.deliver(item)) {
      this.queue.push(item);
    }
    return true;
  }

  /**
   * Next item, or null once the mailbox is closed.
   */
  receive(): Promise<T | null> {
    const item = this.queue.shift();
    if (item !== undefined) {
      this.admitBlocked();
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.waitingReceiver = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];

    const blocked = this.blocked;
    this.blocked = [];
    for (const sender of blocked) {
      sender.reject(new MailboxClosedError());
    }

    const receiver = this.waitingReceiver;
    this.waitingReceiver = null;
    receiver?.(null);
  }

  /** Hand the item straight to a waiting consumer */
  private deliver(item: T): boolean {
    const receiver = this.waitingReceiver;
    if (!receiver) return false;
    this.waitingReceiver = null;
    receiver(item);
    return true;
  }

  private admitBlocked(): void {
    while (this.blocked.length > 0 && this.queue.length < this.capacity) {
      const sender = this.blocked.shift();
      if (!sender) break;
      this.queue.push(sender.item);
      sender.resolve();
    }
  }
}
