export { createDesktopNotifier } from "./desktop.js";
export { NotifyError, type Notification, type Notifier } from "./types.js";
