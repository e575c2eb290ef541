/**
 * File Transport
 * 
 * Appends JSON lines to a daily log file, rotating by size.
 * Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  /** Directory to write log files */
  logDir: string;
  /** Base filename (default: "nudge") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 5MB) */
  maxSize?: number;
  /** Max number of rotated files to keep (default: 3) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private currentPath = "";
  private currentSize = 0;
  private stream: fs.WriteStream | null = null;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.logDir = options.logDir;
    this.filename = options.filename || "nudge";
    this.maxSize = options.maxSize || 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 3;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.open();
  }

  private pathForToday(): string {
    const date = new Date().toISOString().split("T")[0]; // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(): void {
    this.currentPath = this.pathForToday();
    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0;
    }
    this.stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);

    // New day = new file
    if (this.pathForToday() !== this.currentPath) {
      this.stream?.end();
      this.open();
    }

    if (this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    this.stream?.write(line);
    this.currentSize += bytes;
  }

  private rotate(): void {
    this.stream?.end();

    // log.1 is the newest rotation, log.<maxFiles> the oldest
    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.currentPath}.${i + 1}`);
      }
    }
    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.open();
  }

  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.writableLength === 0) return;
    // Writes complete in order: once this empty one is done, so is everything before it
    await new Promise<void>((resolve) => stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}
