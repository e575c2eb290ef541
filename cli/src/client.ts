/**
 * Daemon Client
 *
 * One connection per command: connect, send a single request, wait for the
 * single response, close.
 */

import { WebSocket, type RawData } from "ws";
import { addressUrl, parseResponse, type DaemonAddress, type Request, type Response } from "@nudge/shared/protocol";
import { getCliLogger } from "./logging.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

/** The daemon could not be reached or did not answer in time. */
export class DaemonConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DaemonConnectionError";
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

export function sendRequest(
  request: Request,
  address: DaemonAddress,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
): Promise<Response> {
  const log = getCliLogger().child({ component: "cli.client" });
  const url = addressUrl(address);

  return new Promise<Response>((resolve, reject) => {
    const ws = new WebSocket(url);
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.close();
      settle();
    };

    const timer = setTimeout(() => {
      finish(() => reject(new DaemonConnectionError(`no response from the nudge daemon at ${url} within ${timeoutMs}ms`)));
    }, timeoutMs);

    ws.on("open", () => {
      log.debug("Connected, sending request", { url, request: request.type });
      ws.send(JSON.stringify(request));
    });

    ws.once("message", (data: RawData) => {
      try {
        const response = parseResponse(rawToString(data));
        finish(() => resolve(response));
      } catch (error) {
        finish(() => reject(error));
      }
    });

    ws.on("error", (error: Error) => {
      finish(() =>
        reject(new DaemonConnectionError(`failed to reach the nudge daemon at ${url}: ${error.message}`, { cause: error })),
      );
    });

    ws.on("close", () => {
      finish(() => reject(new DaemonConnectionError(`the nudge daemon at ${url} closed the connection without answering`)));
    });
  });
}
