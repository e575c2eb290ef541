/**
 * Console Transport
 *
 * One line per entry: time, level tag, component, task id, message.
 * Data and errors follow on their own lines.
 */

import { LogTransport, LogEntry, LogLevel } from "../types.js";

// ANSI escape codes
const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const MAGENTA = "\x1b[35m";

const LEVEL_STYLES: Record<LogLevel, { tag: string; color: string }> = {
  trace: { tag: "TRC", color: "\x1b[90m" },
  debug: { tag: "DBG", color: "\x1b[36m" },
  info: { tag: "INF", color: "\x1b[34m" },
  warn: { tag: "WRN", color: "\x1b[33m" },
  error: { tag: "ERR", color: "\x1b[31m" },
  fatal: { tag: "FTL", color: "\x1b[41m\x1b[37m" },
  silent: { tag: "   ", color: RESET },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Use colors (default: stdout is a TTY) */
  colors?: boolean;
  /** Show HH:MM:SS (default: true) */
  timestamps?: boolean;
  /** Pretty print data objects (default: true) */
  prettyPrint?: boolean;
  /** Write every level to stderr, keeping stdout for command output (default: false) */
  stderrOnly?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly timestamps: boolean;
  private readonly prettyPrint: boolean;
  private readonly stderrOnly: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.timestamps = options.timestamps ?? true;
    this.prettyPrint = options.prettyPrint ?? true;
    this.stderrOnly = options.stderrOnly ?? false;
  }

  log(entry: LogEntry): void {
    if (entry.level === "silent") return;

    const style = LEVEL_STYLES[entry.level];
    const head: string[] = [];
    if (this.timestamps) {
      head.push(this.paint(entry.timestamp.slice(11, 19), DIM));
    }
    head.push(this.paint(style.tag, style.color));
    head.push(this.paint(`[${entry.component}]`, MAGENTA));
    if (entry.taskId) {
      head.push(this.paint(`(${entry.taskId})`, DIM));
    }
    head.push(entry.message);

    const lines = [head.join(" ")];
    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint ? JSON.stringify(entry.data, null, 2) : JSON.stringify(entry.data);
      lines.push(this.paint(json, DIM));
    }
    if (entry.error) {
      lines.push(this.paint(`${entry.error.name}: ${entry.error.message}`, LEVEL_STYLES.error.color));
      if (entry.error.stack) {
        lines.push(this.paint(entry.error.stack, DIM));
      }
    }
    const output = lines.join("\n");

    if (this.stderrOnly) {
      console.error(output);
      return;
    }

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(output);
        break;
      case "info":
        console.info(output);
        break;
      case "warn":
        console.warn(output);
        break;
      default:
        console.error(output);
    }
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${RESET}` : text;
  }
}
