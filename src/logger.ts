import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import { readEnum, readOptionalString } from "./config/env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Threshold accepted by the logger; `silent` drops every entry. */
export type LogThreshold = LogLevel | "silent";

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to `HARNESS_LOG_LEVEL`, then `info`. */
  readonly level?: LogThreshold;
  /** File mirroring every written entry. Defaults to `HARNESS_LOG_FILE`; `null` disables it. */
  readonly logFile?: string | null;
  /** Fields merged into every object payload. */
  readonly bindings?: Record<string, unknown>;
  /** Listener invoked with every written entry. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Writes entries to stdout. Defaults to true. */
  readonly echo?: boolean;
}

/** Shared sink so child loggers keep writing through the parent's file queue. */
export interface LogSink {
  readonly level: LogThreshold;
  readonly logFile: string | null;
  readonly onEntry: ((entry: LogEntry) => void) | undefined;
  readonly echo: boolean;
  writeQueue: Promise<void>;
  directoryReady: boolean;
}

/**
 * Structured logger emitting JSON lines on stdout and optionally mirroring them
 * to a file. File writes are queued sequentially to preserve ordering.
 */
export class StructuredLogger {
  private readonly sink: LogSink;
  private readonly bindings: Record<string, unknown>;

  constructor(options: LoggerOptions = {}, sink?: LogSink) {
    this.sink = sink ?? {
      level: options.level ?? readEnum("HARNESS_LOG_LEVEL", THRESHOLDS) ?? "info",
      logFile: options.logFile === undefined ? readOptionalString("HARNESS_LOG_FILE") ?? null : options.logFile,
      onEntry: options.onEntry,
      echo: options.echo ?? true,
      writeQueue: Promise.resolve(),
      directoryReady: false,
    };
    this.bindings = { ...(options.bindings ?? {}) };
  }

  /** Returns a logger adding `bindings` to every payload while sharing this logger's sink. */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({ bindings: { ...this.bindings, ...bindings } }, this.sink);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.sink.level];
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits until every queued file write has been flushed. */
  async flush(): Promise<void> {
    await this.sink.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = this.mergeBindings(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged !== undefined ? { payload: merged } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.sink.echo) {
      process.stdout.write(line);
    }
    this.sink.onEntry?.(entry);

    const logFile = this.sink.logFile;
    if (!logFile) {
      return;
    }
    this.sink.writeQueue = this.sink.writeQueue.then(async () => {
      try {
        if (!this.sink.directoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.sink.directoryReady = true;
        }
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { logFile, error: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        this.sink.directoryReady = false;
      }
    });
  }

  private mergeBindings(payload: unknown): unknown {
    if (Object.keys(this.bindings).length === 0) {
      return payload;
    }
    if (payload === undefined) {
      return { ...this.bindings };
    }
    if (payload !== null && typeof payload === "object" && !Array.isArray(payload)) {
      return { ...this.bindings, ...payload };
    }
    return { ...this.bindings, value: payload };
  }
}
