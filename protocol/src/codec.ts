import type { ZodError } from "zod";
import {
  ClientCommandSchema,
  ServerEventSchema,
  type ClientCommand,
  type ServerEvent,
} from "./schemas";

export type DecodeFailureReason = "unknown_type" | "malformed";

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: DecodeFailureReason; message: string };

function malformed(message: string): DecodeResult<never> {
  return { ok: false, reason: "malformed", message };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "frame"}: ${issue.message}`)
    .join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses one JSON text frame and classifies failures: a frame whose `type`
 * tag is not part of the union is `unknown_type`, anything else that does not
 * match is `malformed`.
 */
function decodeTagged<T>(
  raw: string,
  knownTypes: ReadonlyMap<unknown, unknown>,
  parse: (value: unknown) => { success: true; data: T } | { success: false; error: ZodError }
): DecodeResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return malformed("frame is not valid JSON");
  }

  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    return malformed("frame has no type tag");
  }

  if (!knownTypes.has(parsed.type)) {
    return {
      ok: false,
      reason: "unknown_type",
      message: `unknown frame type: ${parsed.type}`,
    };
  }

  const result = parse(parsed);
  if (!result.success) {
    return malformed(formatIssues(result.error));
  }
  return { ok: true, value: result.data };
}

export function decodeClientCommand(raw: string): DecodeResult<ClientCommand> {
  return decodeTagged(raw, ClientCommandSchema.optionsMap, (value) =>
    ClientCommandSchema.safeParse(value)
  );
}

export function decodeServerEvent(raw: string): DecodeResult<ServerEvent> {
  return decodeTagged(raw, ServerEventSchema.optionsMap, (value) =>
    ServerEventSchema.safeParse(value)
  );
}

export function encodeFrame(frame: ServerEvent | ClientCommand): string {
  return JSON.stringify(frame);
}
