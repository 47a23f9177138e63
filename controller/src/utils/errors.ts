import type { ErrorCode } from "@edgepulse/protocol";

export class EdgePulseError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "EdgePulseError";
  }
}

export class InvalidInputError extends EdgePulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid input: ${message}`, "INVALID_INPUT", details);
    this.name = "InvalidInputError";
  }
}

export class InferenceTimeoutError extends EdgePulseError {
  constructor(timeoutMs: number) {
    super(`Inference timed out after ${timeoutMs}ms`, "TIMEOUT", { timeoutMs });
    this.name = "InferenceTimeoutError";
  }
}

export class InferenceCancelledError extends EdgePulseError {
  constructor(reason?: string) {
    super(`Inference cancelled${reason ? `: ${reason}` : ""}`, "CANCELLED", {
      reason,
    });
    this.name = "InferenceCancelledError";
  }
}

export class ConnectionLostError extends EdgePulseError {
  constructor(sessionId: string, cause?: Error) {
    super(`Connection lost: ${sessionId}`, "CONNECTION_LOST", {
      sessionId,
      cause: cause?.message,
    });
    this.name = "ConnectionLostError";
  }
}

export class UnknownCommandError extends EdgePulseError {
  constructor(message: string) {
    super(`Unknown command: ${message}`, "UNKNOWN_COMMAND");
    this.name = "UnknownCommandError";
  }
}

export class MalformedCommandError extends EdgePulseError {
  constructor(message: string) {
    super(`Malformed command: ${message}`, "MALFORMED_COMMAND");
    this.name = "MalformedCommandError";
  }
}

export function httpStatusFor(error: unknown): 400 | 500 | 504 {
  if (!(error instanceof EdgePulseError)) return 500;
  switch (error.code) {
    case "INVALID_INPUT":
    case "MALFORMED_COMMAND":
    case "UNKNOWN_COMMAND":
      return 400;
    case "TIMEOUT":
      return 504;
    default:
      return 500;
  }
}
