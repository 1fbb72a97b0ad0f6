/**
 * Subject Tutor: Structured Logger
 *
 * JSON-lines event log. Entries go to stderr (stdout belongs to the MCP
 * stdio transport) and, when a log directory is configured, are appended to
 * events.ndjson / errors.ndjson.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs";
import * as path from "path";
import type { EventLogEntry, LogLevel } from "./types.js";

export type LogSink = (entry: EventLogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: LogLevel,
  component: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    data,
  };
}

export function stderrSink(entry: EventLogEntry): void {
  console.error(JSON.stringify(entry));
}

/**
 * Sink appending to events.ndjson, with errors mirrored to errors.ndjson
 */
export class FileLogSink {
  private readonly events: fs.WriteStream;
  private readonly errors: fs.WriteStream;

  constructor(logDir: string) {
    fs.mkdirSync(logDir, { recursive: true });
    this.events = fs.createWriteStream(path.join(logDir, "events.ndjson"), { flags: "a" });
    this.errors = fs.createWriteStream(path.join(logDir, "errors.ndjson"), { flags: "a" });
    for (const stream of [this.events, this.errors]) {
      stream.on("error", (err) => {
        console.error(JSON.stringify(createLogEntry("error", "logger", "Log file write failed", { error: err.message })));
      });
    }
  }

  write(entry: EventLogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    this.events.write(line);
    if (entry.level === "error") {
      this.errors.write(line);
    }
  }

  close(): Promise<void> {
    const end = (stream: fs.WriteStream) =>
      new Promise<void>((resolve) => stream.end(() => resolve()));
    return Promise.all([end(this.events), end(this.errors)]).then(() => undefined);
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  sinks?: LogSink[];
}

export class Logger {
  private readonly level: LogLevel;
  private readonly component: string;
  private readonly sinks: LogSink[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.component = options.component ?? "tutor";
    this.sinks = options.sinks ?? [stderrSink];
  }

  /**
   * Logger for a sub-component sharing this logger's level and sinks
   */
  child(component: string): Logger {
    return new Logger({ level: this.level, component, sinks: this.sinks });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) return;
    const entry = createLogEntry(level, this.component, message, data);
    for (const sink of this.sinks) {
      sink(entry);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }
}

/**
 * Logger that drops everything; used where a caller passes no logger
 */
export const silentLogger = new Logger({ level: "error", sinks: [] });

/**
 * Prompts and answers can be long; keep log lines readable
 */
export function preview(text: string, max: number = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
