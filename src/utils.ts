/**
 * RVK-Classifier-MCP: Core Utilities
 *
 * Error construction, structured logging, text and timing helpers.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { ErrorCode, EventLogEntry, LogLevel, ToolError } from "./types.js";

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write JSONL file (append mode)
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Normalize a term for case-insensitive comparison
 */
export function normalizeTerm(text: string): string {
  return text.normalize("NFC").trim().toLowerCase();
}

/**
 * Split text into lowercase words (Unicode letters and digits)
 *
 * @example
 * tokenize("Medizinische Informatik") // ["medizinische", "informatik"]
 */
export function tokenize(text: string): string[] {
  return normalizeTerm(text).split(/[^\p{L}\p{N}]+/u).filter(w => w.length > 0);
}

/**
 * Check if `term` occurs in `text` as a whole word or word sequence
 */
export function containsWord(text: string, term: string): boolean {
  const words = tokenize(text);
  const termWords = tokenize(term);
  if (termWords.length === 0) return false;

  for (let i = 0; i + termWords.length <= words.length; i++) {
    if (termWords.every((w, j) => words[i + j] === w)) {
      return true;
    }
  }
  return false;
}

/**
 * Wrap a value that XML parsing may yield as single item or list
 */
export function asArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    success: false,
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Narrow an unknown thrown value to a ToolError
 */
export function isToolError(value: unknown): value is ToolError {
  return (
    typeof value === "object" &&
    value !== null &&
    "isError" in value &&
    value.isError === true &&
    "code" in value &&
    typeof value.code === "string"
  );
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

/**
 * Error message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  if (isToolError(err)) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

// ============================================================================
// Logging
// ============================================================================

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
  level: EventLogEntry["level"],
  phase: string,
  tool: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    phase,
    tool,
    message,
    data,
  };
}

/**
 * Structured logger.
 *
 * Entries go to stderr as JSON lines (stdout carries the MCP transport) and,
 * with a log directory, to `events.ndjson` / `errors.ndjson` in that directory.
 */
export class ClassifierLogger {
  private logsDir?: string;
  private minLevel: LogLevel;
  private sink: (line: string) => void;

  constructor(options: {
    level?: LogLevel;
    logDir?: string;
    sink?: (line: string) => void;
  } = {}) {
    this.logsDir = options.logDir;
    this.minLevel = options.level ?? "info";
    this.sink = options.sink ?? (line => process.stderr.write(line + "\n"));
  }

  async init(): Promise<void> {
    if (this.logsDir) {
      await ensureDir(this.logsDir);
    }
  }

  async log(entry: EventLogEntry): Promise<void> {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.minLevel]) return;

    this.sink(JSON.stringify(entry));

    if (this.logsDir) {
      const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
      await appendJsonl(path.join(this.logsDir, file), [entry]);
    }
  }

  async debug(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("debug", phase, tool, message, data));
  }

  async info(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("info", phase, tool, message, data));
  }

  async warn(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("warn", phase, tool, message, data));
  }

  async error(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("error", phase, tool, message, data));
  }
}

/**
 * Logger that drops every entry (library use and tests)
 */
export function silentLogger(): ClassifierLogger {
  return new ClassifierLogger({ level: "error", sink: () => undefined });
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Measure execution time
 */
export async function timed<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const start = performance.now();
  const result = await fn();
  const duration_ms = Math.round(performance.now() - start);
  return { result, duration_ms };
}

export function cancelledError(context?: Record<string, unknown>): ToolError {
  return createToolError("CANCELLED", "Classification request was cancelled", {
    details: context,
    recoverable: true,
  });
}

/**
 * Wait `ms` milliseconds; rejects with CANCELLED as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal, context?: Record<string, unknown>): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError(context));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError(context));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Throw CANCELLED if the signal has been aborted
 */
export function throwIfAborted(signal: AbortSignal | undefined, context?: Record<string, unknown>): void {
  if (signal?.aborted) {
    throw cancelledError(context);
  }
}

/**
 * Wait for a promise unless the signal aborts first.
 * The underlying promise keeps running; only the caller stops waiting.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, context?: Record<string, unknown>): Promise<T> {
  if (!signal) return promise;
  throwIfAborted(signal, context);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(cancelledError(context));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
