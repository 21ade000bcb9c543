/**
 * Error taxonomy and the explicit result type returned by every tool operation.
 *
 * Operations never throw across the tool boundary: they return a
 * `ToolResult<T>`, and `ToolHandlers.callTool` turns the failure branch into
 * the `{"error": "<message>"}` wire shape.
 */

export type ToolErrorCode =
  | "INVALID_IDENTIFIER_FORMAT"
  | "INVALID_ACTION"
  | "INVALID_ARGUMENTS"
  | "NOT_FOUND"
  | "BACKEND_CALL_FAILED"
  | "UNKNOWN_TOOL";

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ToolError";
  }
}

/** Discriminated union result: success carries the value, failure a `ToolError`. */
export type ToolResult<T> = { ok: true; value: T } | { ok: false; error: ToolError };

export function succeed<T>(value: T): ToolResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: ToolErrorCode, message: string, cause?: unknown): ToolResult<T> {
  return { ok: false, error: new ToolError(code, message, { cause }) };
}

/**
 * Extracts a human-readable message from anything thrown.
 *
 * OCI SDK service errors are plain objects carrying `message`, `statusCode`
 * and `serviceCode`, not always `Error` instances.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string") return message;
  }
  return String(error);
}

/**
 * Runs a backend operation and maps any thrown error to `BACKEND_CALL_FAILED`
 * with `<prefix>: <cause>` as the message. No retry.
 */
export async function attempt<T>(
  operation: () => Promise<T>,
  prefix: string,
): Promise<ToolResult<T>> {
  try {
    return succeed(await operation());
  } catch (error) {
    return fail("BACKEND_CALL_FAILED", `${prefix}: ${describeError(error)}`, error);
  }
}
