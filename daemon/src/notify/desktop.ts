/**
 * Desktop Notifier
 *
 * Hands reminders to the OS notification center through node-notifier.
 */

import notifier from "node-notifier";
import { createComponentLogger } from "../logging.js";
import { NotifyError, type Notification, type Notifier } from "./types.js";

export function createDesktopNotifier(): Notifier {
  const log = createComponentLogger("notify");

  return {
    notify(notification: Notification): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        notifier.notify(
          {
            title: notification.summary,
            message: notification.body,
            icon: notification.image,
            sound: notification.sound ?? false,
            wait: false,
          },
          (err) => {
            if (err) {
              reject(new NotifyError(`desktop notification failed: ${err.message}`, { cause: err }));
              return;
            }
            log.debug("Notification shown", { summary: notification.summary });
            resolve();
          },
        );
      });
    },
  };
}
