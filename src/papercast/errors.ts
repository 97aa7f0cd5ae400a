export type PapercastErrorCode =
  | "MALFORMED_MODEL_OUTPUT"
  | "LOOKUP_FAILURE"
  | "GATE_TIMEOUT"
  | "GATE_FAILED"
  | "PAPER_NOT_FOUND"
  | "LLM_FAILURE"
  | "CANCELLED"
  | "BAD_REQUEST"
  | "CONFIG_ERROR"
  | "INTERNAL";

export class PapercastError extends Error {
  readonly code: PapercastErrorCode;
  readonly details?: unknown;

  constructor(code: PapercastErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PapercastError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: PapercastErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function isPapercastError(err: unknown, code?: PapercastErrorCode): err is PapercastError {
  return err instanceof PapercastError && (code === undefined || err.code === code);
}

export function toPapercastError(err: unknown): PapercastError {
  if (err instanceof PapercastError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError") {
      const issues = "issues" in err ? err.issues : undefined;
      return new PapercastError("BAD_REQUEST", "Validation error", { issues }, { cause: err });
    }
    if (err.name === "LlmError") {
      const type = "type" in err ? err.type : undefined;
      if (type === "aborted") {
        return new PapercastError("CANCELLED", err.message, undefined, { cause: err });
      }
      const retryable = "retryable" in err ? err.retryable : undefined;
      return new PapercastError("LLM_FAILURE", err.message, { type, retryable }, { cause: err });
    }
    if (err.name === "AbortError") {
      return new PapercastError("CANCELLED", err.message || "Operation aborted", undefined, { cause: err });
    }
    return new PapercastError("INTERNAL", err.message, { name: err.name, stack: err.stack }, { cause: err });
  }
  return new PapercastError("INTERNAL", "Unknown error", { err });
}

/**
 * Whatever failed after the caller's signal fired is reported as a cancellation.
 */
export function toCancelledError(err: unknown): PapercastError {
  if (isPapercastError(err, "CANCELLED")) return err;
  return new PapercastError("CANCELLED", "Run cancelled", undefined, { cause: err });
}

/**
 * Result envelope for workflow invocations
 */
export type WorkflowResult<T> =
  | { kind: "ok"; result: T }
  | { kind: "error"; code: PapercastErrorCode; message: string; details?: unknown };

export function okResult<T>(result: T): WorkflowResult<T> {
  return { kind: "ok", result };
}

export function errorResult(err: PapercastError): WorkflowResult<never> {
  return {
    kind: "error",
    code: err.code,
    message: err.message,
    ...(err.details !== undefined && { details: err.details })
  };
}

/**
 * Runs `fn` and folds any thrown value into the error envelope.
 */
export async function settle<T>(fn: () => Promise<T>): Promise<WorkflowResult<T>> {
  try {
    return okResult(await fn());
  } catch (err) {
    return errorResult(toPapercastError(err));
  }
}
