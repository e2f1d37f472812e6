import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Default maximum size (in bytes) of the primary log file before a rotation is
 * triggered.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Correlation fields attached to every entry emitted by a (child) logger. */
export interface LogBindings {
  planet_id?: number;
  explorer_id?: number;
  component?: string;
}

export interface LogEntry extends LogBindings {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Entries below this level are discarded. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Write entries on stdout. Defaults to true. */
  readonly mirrorToStdout?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/** Writes an internal failure on stderr without going through the logger. */
function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/** File mirror shared by a logger and all of its children. */
class LogFileSink {
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly logFile: string,
    private readonly maxFileSizeBytes: number,
    private readonly maxFileCount: number,
  ) {}

  append(line: string): void {
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureDirectory();
          await this.rotateIfNeeded(Buffer.byteLength(line, "utf8"));
          await appendFile(this.logFile, line, "utf8");
        } catch (error) {
          reportInternalFailure("log_file_write_failed", error);
          // Allow future attempts to retry directory creation after a failure.
          this.directoryReady = false;
        }
      })
      .catch((error: unknown) => {
        reportInternalFailure("log_queue_failed", error);
        this.writeQueue = Promise.resolve();
      });
  }

  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(dirname(this.logFile), { recursive: true });
    this.directoryReady = true;
  }

  /**
   * Rotates the active log file when appending the pending bytes would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(this.logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation();
    } catch (error) {
      reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  private async performRotation(): Promise<void> {
    const keep = Math.max(1, this.maxFileCount);
    if (keep === 1) {
      await rm(this.logFile, { force: true });
      return;
    }

    await rm(`${this.logFile}.${keep - 1}`, { force: true });

    for (let index = keep - 2; index >= 1; index -= 1) {
      await this.renameIfPresent(`${this.logFile}.${index}`, `${this.logFile}.${index + 1}`);
    }
    await this.renameIfPresent(this.logFile, `${this.logFile}.1`);
  }

  private async renameIfPresent(source: string, target: string): Promise<void> {
    try {
      await rename(source, target);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }
}

interface LoggerCore {
  readonly minRank: number;
  readonly mirrorToStdout: boolean;
  readonly sink: LogFileSink | null;
  readonly entryListener?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private core: LoggerCore;
  private readonly bindings: LogBindings;

  constructor(options: LoggerOptions = {}, bindings: LogBindings = {}) {
    this.core = {
      minRank: LEVEL_RANK[options.minLevel ?? "info"],
      mirrorToStdout: options.mirrorToStdout ?? true,
      sink: options.logFile
        ? new LogFileSink(
            options.logFile,
            options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE,
            options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT,
          )
        : null,
      entryListener: options.onEntry,
    };
    this.bindings = { ...bindings };
  }

  /** Logger sharing the same destinations with extra correlation fields. */
  child(bindings: LogBindings): StructuredLogger {
    const child = new StructuredLogger({}, { ...this.bindings, ...bindings });
    child.core = this.core;
    return child;
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

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.core.sink?.flush();
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.core.minRank) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.core.mirrorToStdout) {
      process.stdout.write(line);
    }
    if (this.core.entryListener) {
      this.core.entryListener(structuredClone(entry));
    }
    this.core.sink?.append(line);
  }
}
