/**
 * Daemon address, shared by the daemon (listen) and the CLI (connect).
 */

import { ConfigurationError } from "../errors.js";

export const DEFAULT_DAEMON_ADDR = "127.0.0.1:8082";

export interface DaemonAddress {
  host: string;
  port: number;
}

export function parseAddress(value: string): DaemonAddress {
  const match = value.trim().match(/^(.+):(\d{1,5})$/);
  const port = match ? parseInt(match[2], 10) : NaN;
  if (!match || port < 1 || port > 65535) {
    throw new ConfigurationError(`invalid address "${value}"; expected host:port`, value);
  }
  return { host: match[1], port };
}

export function addressUrl(address: DaemonAddress): string {
  return `ws://${address.host}:${address.port}`;
}
