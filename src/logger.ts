import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default maximum size of the mirrored log file before rotation occurs. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface; `process.stderr` satisfies it. */
export interface LogStream {
  write(line: string): unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Destination for JSON lines. Defaults to `process.stderr`; `null` silences it. */
  readonly stream?: LogStream | null;
  readonly logFile?: string | null;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  readonly level: LogLevel;
  private readonly stream: LogStream | null;
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  /**
   * Tracks whether the directory containing {@link logFile} has already been
   * created so `mkdir` runs once per logger rather than once per entry.
   */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.stream = options.stream === undefined ? process.stderr : options.stream;
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.entryListener = options.onEntry;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
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

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream?.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (logFile === null) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          this.reportInternalFailure("log_file_write_failed", err);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        this.reportInternalFailure("log_queue_failed", err);
        this.writeQueue = Promise.resolve();
      });
  }

  /** Waits for all pending file writes to be flushed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: error instanceof Error ? { message: error.message } : { error: String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending `pendingBytes` would exceed the
   * configured size. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await this.renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await this.renameIfPresent(logFile, `${logFile}.1`);
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
