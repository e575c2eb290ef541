/**
 * WebSocket Server
 *
 * Accepts CLI connections and answers every message with exactly one
 * response. Request semantics live in handler.ts.
 */

import { WebSocketServer, WebSocket, type RawData } from "ws";
import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { respond, type RequestHandler } from "./handler.js";

export interface DaemonServerOptions {
  host: string;
  port: number;
  handler: RequestHandler;
}

export interface DaemonServer {
  readonly wss: WebSocketServer;
  /** Disconnect every client and stop listening */
  close(): Promise<void>;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Start listening. Resolves once the port is bound, rejects if it cannot be.
 */
export function createDaemonServer(options: DaemonServerOptions): Promise<DaemonServer> {
  const log = createComponentLogger("ws");
  const wss = new WebSocketServer({ host: options.host, port: options.port });

  wss.on("connection", (ws, req) => {
    const connLog = log.child({ connectionId: nanoid(8) });
    connLog.debug("Client connected", { remote: req.socket.remoteAddress });

    ws.on("message", (data) => {
      void respond(rawToString(data), options.handler, connLog).then(
        (response) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(JSON.stringify(response));
          }
        },
        (error: unknown) => {
          connLog.error("Failed to answer request", error);
        },
      );
    });

    ws.on("error", (error) => {
      connLog.warn("Connection error", { error: error.message });
    });

    ws.on("close", () => {
      connLog.debug("Client disconnected");
    });
  });

  const close = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close((error) => (error ? reject(error) : resolve()));
    });

  return new Promise<DaemonServer>((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    wss.once("error", onError);
    wss.once("listening", () => {
      wss.off("error", onError);
      wss.on("error", (error) => log.error("Server error", error));
      log.info(`Listening on ws://${options.host}:${options.port}`);
      resolve({ wss, close });
    });
  });
}
