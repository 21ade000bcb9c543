/**
 * ResponseFormatter
 * Single responsibility: serialise tool results into the wire JSON format.
 */
import type { ToolError } from "../utils/errors.js";

export class ResponseFormatter {
  /** The only error shape callers ever see: `{"error": "<message>"}`. */
  public errorEnvelope(error: ToolError): string {
    return JSON.stringify({ error: error.message });
  }

  public formatSuccess(data: unknown): string {
    return JSON.stringify(data, null, 2);
  }
}
