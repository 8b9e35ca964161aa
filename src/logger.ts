import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted in place of redacted values. */
const REDACTION_TOKEN = "[REDACTED]";

/**
 * Payload keys whose values are redacted. Secret resources flow through the
 * cache, so key material must never reach the log sinks verbatim.
 */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "token",
  "access_token",
  "password",
  "secret",
  "private_key",
  "privatekey",
  "inline_bytes",
  "inline_string",
]);

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** File mirroring every emitted line. `null` keeps the logger on stdout only. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Redact {@link SENSITIVE_KEYS} inside payloads. Defaults to true. */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Sink receiving the serialised lines. Defaults to stdout. */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minRank: number;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly write: (line: string) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.minRank = LEVEL_RANK[options.level ?? "info"];
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.entryListener = options.onEntry;
    this.write = options.write ?? ((line) => process.stdout.write(line));
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

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Whether entries at {@link level} are currently emitted. */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minRank;
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const safePayload = payload !== undefined && this.redactionEnabled ? deepRedact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry, jsonReplacer)}\n`;
    this.write(line);
    this.entryListener?.(entry);

    const logFile = this.logFile;
    if (logFile === null) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
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

/** Serialises the collections used by cache payloads (sets and maps). */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) {
    return [...value];
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

function deepRedact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => deepRedact(item));
  }
  if (value instanceof Map || value instanceof Set) {
    return value;
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : deepRedact(entry);
    }
    return result;
  }
  return value;
}
