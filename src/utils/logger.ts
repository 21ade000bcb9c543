/**
 * Lightweight structured logger for the OCI compute MCP server.
 *
 * Design constraints:
 *   - The stdio transport owns stdout, so ALL log output goes to stderr.
 *   - Output: newline-delimited JSON so log aggregators can ingest directly.
 *   - Automatically includes `sessionId` and `tool` from AsyncLocalStorage.
 *   - Respects `OCI_COMPUTE_LOG_LEVEL` (default "info").
 *
 * Usage:
 *   import { logger } from "../utils/logger.js";
 *   logger.info("Compartments listed", { count });
 *   logger.error("Instance action failed", err);
 */

import { OCI_COMPUTE_LOG_LEVEL } from "../env.js";
import { getRequestContext } from "../request-context.js";

// ── Level priority map ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Accepted context types for logger methods.
 *
 * - `Record<string, unknown>` — structured key-value pairs (preferred)
 * - `Error` — mapped to `{ cause: err.message, stack: err.stack }`
 * - `string` — mapped to `{ detail: str }`
 * - anything else caught from a try/catch is coerced with `String()`
 */
export type LogContext = Record<string, unknown> | Error | string | unknown;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const MIN_LEVEL_PRIORITY: number =
  LEVEL_PRIORITY[isLogLevel(OCI_COMPUTE_LOG_LEVEL) ? OCI_COMPUTE_LOG_LEVEL : "info"];

// ── Core emitter ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalises any accepted context type into a plain record.
 */
export function normalizeContext(ctx: LogContext | undefined): Record<string, unknown> | undefined {
  if (ctx === undefined || ctx === null) return undefined;
  if (ctx instanceof Error) {
    return { cause: ctx.message, stack: ctx.stack };
  }
  if (typeof ctx === "string") {
    return ctx.length > 0 ? { detail: ctx } : undefined;
  }
  if (isRecord(ctx)) {
    return ctx;
  }
  return { value: String(ctx) };
}

function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_PRIORITY[level] < MIN_LEVEL_PRIORITY) return;

  const { sessionId, toolName } = getRequestContext();
  const record: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (sessionId) record.sessionId = sessionId;
  if (toolName) record.tool = toolName;

  const normalized = normalizeContext(context);
  if (normalized) Object.assign(record, normalized);

  let line: string;
  try {
    line = JSON.stringify(record);
  } catch (serializationError) {
    // Circular or BigInt context.
    line = JSON.stringify({
      level,
      msg: message,
      ts: record.ts,
      contextDropped: String(serializationError),
    });
  }
  process.stderr.write(line + "\n");
}

// ── Public logger interface ───────────────────────────────────────────────────

export const logger = {
  /** Verbose diagnostics, enabled only at OCI_COMPUTE_LOG_LEVEL=debug. */
  debug(message: string, context?: LogContext): void {
    emit("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    emit("info", message, context);
  },

  /** Failed tool calls and degraded operation. */
  warn(message: string, context?: LogContext): void {
    emit("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    emit("error", message, context);
  },
};
