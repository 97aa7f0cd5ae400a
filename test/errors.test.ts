import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  PapercastError,
  errorResult,
  isPapercastError,
  okResult,
  settle,
  toCancelledError,
  toPapercastError
} from "../src/papercast/errors.js";
import { LlmError } from "../src/papercast/llm/types.js";

describe("PapercastError", () => {
  it("creates error with code and message", () => {
    const err = new PapercastError("GATE_TIMEOUT", "Too slow");
    expect(err.code).toBe("GATE_TIMEOUT");
    expect(err.message).toBe("Too slow");
    expect(err.name).toBe("PapercastError");
  });

  it("toJSON returns serializable object", () => {
    const err = new PapercastError("BAD_REQUEST", "Invalid input", { field: "query" });
    expect(err.toJSON()).toEqual({ code: "BAD_REQUEST", message: "Invalid input", details: { field: "query" } });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new PapercastError("INTERNAL", "Something went wrong").toJSON();
    expect("details" in json).toBe(false);
  });

  it("isPapercastError checks the code when given", () => {
    const err = new PapercastError("CANCELLED", "stop");
    expect(isPapercastError(err)).toBe(true);
    expect(isPapercastError(err, "CANCELLED")).toBe(true);
    expect(isPapercastError(err, "INTERNAL")).toBe(false);
    expect(isPapercastError(new Error("x"))).toBe(false);
  });
});

describe("toPapercastError", () => {
  it("returns PapercastError unchanged", () => {
    const original = new PapercastError("LOOKUP_FAILURE", "down");
    expect(toPapercastError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toPapercastError(new Error("Something failed"));
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
    expect(result.details).toHaveProperty("stack");
  });

  it("converts ZodError to BAD_REQUEST", () => {
    const parsed = z.object({ query: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const result = toPapercastError(parsed.error);
    expect(result.code).toBe("BAD_REQUEST");
    expect(result.message).toBe("Validation error");
    expect(result.details).toHaveProperty("issues");
  });

  it("converts LlmError to LLM_FAILURE with its type", () => {
    const result = toPapercastError(new LlmError("rate_limited", "slow down"));
    expect(result.code).toBe("LLM_FAILURE");
    expect(result.message).toBe("slow down");
    expect(result.details).toEqual({ type: "rate_limited", retryable: true });
  });

  it("converts an aborted LlmError to CANCELLED", () => {
    const result = toPapercastError(new LlmError("aborted", "Request cancelled", { retryable: false }));
    expect(result.code).toBe("CANCELLED");
    expect(result.message).toBe("Request cancelled");
    expect(result.details).toBeUndefined();
  });

  it("reports any failure as CANCELLED once the caller aborted", () => {
    const cancelled = new PapercastError("CANCELLED", "stop");
    expect(toCancelledError(cancelled)).toBe(cancelled);

    const result = toCancelledError(new Error("socket closed"));
    expect(result.code).toBe("CANCELLED");
    expect(result.message).toBe("Run cancelled");
  });

  it("converts AbortError to CANCELLED", () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    expect(toPapercastError(abort).code).toBe("CANCELLED");
  });

  it("converts non-Error values to INTERNAL", () => {
    const result = toPapercastError("string error");
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Unknown error");
    expect(result.details).toEqual({ err: "string error" });
  });
});

describe("result envelopes", () => {
  it("okResult wraps the value", () => {
    expect(okResult({ n: 1 })).toEqual({ kind: "ok", result: { n: 1 } });
  });

  it("errorResult copies code, message and details", () => {
    const result = errorResult(new PapercastError("PAPER_NOT_FOUND", "none", { query: "q" }));
    expect(result).toEqual({ kind: "error", code: "PAPER_NOT_FOUND", message: "none", details: { query: "q" } });
  });

  it("settle folds a thrown error into the envelope", async () => {
    const result = await settle(async () => {
      throw new PapercastError("GATE_FAILED", "1 handler(s) failed before the gate opened");
    });
    expect(result).toEqual({
      kind: "error",
      code: "GATE_FAILED",
      message: "1 handler(s) failed before the gate opened"
    });
  });

  it("settle passes a value through", async () => {
    expect(await settle(async () => 42)).toEqual({ kind: "ok", result: 42 });
  });
});
