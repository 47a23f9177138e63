import type { EventEmitter } from "events";
import type { ClientCommand } from "./schemas";

/**
 * Client side of a telemetry connection.
 *
 * Emits `open`, `close` (code, reason), `error` (Error) and `message` (the raw
 * text frame). Implementations connect as soon as they are constructed.
 */
export interface Transport extends EventEmitter {
  send(command: ClientCommand): void;
  close(): void;
}

export type TransportFactory = (url: string) => Transport;
