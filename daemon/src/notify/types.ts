/**
 * Notifier contract consumed by the scheduler.
 */

export interface Notification {
  summary: string;
  body: string;
  /** Path of an image shown with the notification */
  image?: string;
  /** Path or name of a sound played with the notification */
  sound?: string;
}

export interface Notifier {
  /** Resolves once the notification was handed to the desktop; rejects with NotifyError otherwise */
  notify(notification: Notification): Promise<void>;
}

export class NotifyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotifyError";
  }
}
