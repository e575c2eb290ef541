/**
 * Protocol Module
 *
 * Client/daemon message shapes, parsing and display helpers.
 */

export type {
  Clock,
  ClockType,
  Task,
  AddRequest,
  CancelRequest,
  ListRequest,
  Request,
  Response,
} from "./types.js";

export { parseClock, parseRequest, parseResponse } from "./parse.js";
export { describeClock } from "./describe.js";
export { DEFAULT_DAEMON_ADDR, addressUrl, parseAddress, type DaemonAddress } from "./address.js";
