import { describe, expect, it } from "vitest";
import { attempt, describeError, fail, succeed, ToolError } from "./errors.js";

describe("errors", () => {
  it("describeError reads Error instances, SDK-style objects and primitives", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(
      describeError({ statusCode: 404, serviceCode: "NotAuthorizedOrNotFound", message: "missing" }),
    ).toBe("missing");
    expect(describeError({ message: 42 })).toBe("[object Object]");
    expect(describeError("plain")).toBe("plain");
  });

  it("attempt wraps successes and prefixes failures", async () => {
    await expect(attempt(async () => 7, "Failed to count")).resolves.toEqual(succeed(7));

    const cause = new Error("connection reset");
    const result = await attempt(async () => {
      throw cause;
    }, "Failed to list compartments");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ToolError);
    expect(result.error.code).toBe("BACKEND_CALL_FAILED");
    expect(result.error.message).toBe("Failed to list compartments: connection reset");
    expect(result.error.cause).toBe(cause);
  });

  it("fail builds a failure branch with the given code", () => {
    const result = fail("NOT_FOUND", "nothing here");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe("ToolError");
    expect(result.error.code).toBe("NOT_FOUND");
  });
});
