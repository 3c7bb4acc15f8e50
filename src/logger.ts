import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getRequestContext, type RequestContext } from "./http/requestContext.js";
import { isMissingPath } from "./nodePrimitives.js";

/** Placeholder inserted when a secret value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Payload keys that may carry credentials; their values are never logged verbatim. */
const SENSITIVE_KEYS = new Set(["authorization", "cookie", "set-cookie", "token", "auth_token", "bearer"]);

/**
 * What the logger scrubs. With `enabled`, values under {@link SENSITIVE_KEYS}
 * are replaced and every occurrence of a secret inside a string is masked.
 */
export interface RedactionPolicy {
  readonly enabled: boolean;
  /** Literal values masked wherever they appear, typically the shared auth token. */
  readonly secrets: readonly string[];
}

export const NO_REDACTION: RedactionPolicy = Object.freeze({ enabled: false, secrets: Object.freeze([]) });

/** Maximum size (in bytes) of the primary log file before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string;
  method?: string;
  path?: string;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Defaults to {@link NO_REDACTION}; the service derives it from `APP_LOG_REDACT`. */
  readonly redaction?: RedactionPolicy;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Stream receiving the JSON lines; defaults to stdout. */
  readonly stdout?: { write(chunk: string): unknown };
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering. Entries
 * emitted while an HTTP request is served carry its correlation fields.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redaction: RedactionPolicy;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory holding {@link logFile} was already created. */
  private logDirectoryReady = false;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly stdout: { write(chunk: string): unknown };

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const redaction = options.redaction ?? NO_REDACTION;
    // Longest first, so a secret containing another one is masked whole.
    const secrets = [...new Set(redaction.secrets)].filter((secret) => secret.length > 0);
    this.redaction = { enabled: redaction.enabled, secrets: secrets.sort((a, b) => b.length - a.length) };
    this.entryListener = options.onEntry;
    this.stdout = options.stdout ?? process.stdout;
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

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const context = getRequestContext();
    const safePayload = payload === undefined || !this.redaction.enabled ? payload : this.redact(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...correlationFields(context),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stdout.write(line);
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
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        reportInternalFailure("log_file_write_failed", err);
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

  /**
   * Rotates the active log file when appending {@link pendingBytes} would
   * exceed the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingPath(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  /** Shifts `file` to `file.1`, `file.1` to `file.2`, … dropping the oldest generation. */
  private async performRotation(logFile: string): Promise<void> {
    const generations = [logFile];
    for (let index = 1; index < this.maxFileCount; index += 1) {
      generations.push(`${logFile}.${index}`);
    }
    await rm(generations[generations.length - 1], { force: true });
    for (let index = generations.length - 2; index >= 0; index -= 1) {
      await renameIfPresent(generations[index], generations[index + 1]);
    }
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.redaction.secrets.reduce((text, secret) => text.split(secret).join(REDACTION_TOKEN), value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry),
        ]),
      );
    }
    return value;
  }
}

function correlationFields(context: RequestContext | undefined): Pick<LogEntry, "request_id" | "method" | "path"> {
  if (!context) {
    return {};
  }
  return { request_id: context.requestId, method: context.method, path: context.path };
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingPath(error)) {
      throw error;
    }
  }
}

/** Failures of the logger itself go to stderr so they never recurse. */
function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
