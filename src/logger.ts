import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Minimum level emitted; lower entries are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  readonly logFile?: string | null;
  /**
   * Destination of every JSON line. Defaults to stdout; tests and embedding
   * hosts pass their own sink to keep the process output clean.
   */
  readonly write?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock used for deterministic timestamps in tests. */
  readonly clock?: () => Date;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly logFile?: string;
  private readonly write: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly clock: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory holding {@link logFile} was already created. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "debug";
    if (options.logFile) {
      this.logFile = options.logFile;
    }
    this.write = options.write ?? ((line) => process.stdout.write(line));
    if (options.onEntry) {
      this.entryListener = options.onEntry;
    }
    this.clock = options.clock ?? (() => new Date());
  }

  isLevelEnabled(level: LogLevel): boolean {
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

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.clock().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: this.clock().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow future attempts to retry directory creation after a failure.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}
