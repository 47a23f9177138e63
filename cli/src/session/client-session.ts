import { EventEmitter } from "events";
import {
  createWebSocketTransport,
  decodeServerEvent,
  type ClientCommand,
  type ErrorEvent,
  type InferenceResultPayload,
  type StateSnapshotEvent,
  type Transport,
  type TransportFactory,
} from "@edgepulse/protocol";
import { backoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from "./backoff.js";
import { RenderThrottle } from "./render-throttle.js";
import { logger as defaultLogger, type CliLogger } from "../logger.js";

export type SessionState = "disconnected" | "connecting" | "connected" | "reconnecting";

export interface ClientSessionOptions {
  url: string;
  transportFactory?: TransportFactory;
  backoff?: BackoffPolicy;
  renderWindowMs?: number;
  livenessIntervalMs?: number;
  logger?: CliLogger;
}

export type ServerError = ErrorEvent["data"];

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { message: error.message, name: error.name };
  }
  return { value: String(error) };
}

/**
 * Dashboard side of a telemetry connection.
 *
 * Events:
 * - `state` (SessionState) on every transition
 * - `render` (StateSnapshotEvent), throttled to one per render window
 * - `inference` (InferenceResultPayload) and `serverError` (ServerError), unthrottled
 */
export class ClientSession extends EventEmitter {
  private state: SessionState = "disconnected";
  private transport: Transport | null = null;
  private attempts = 0;
  private exhausted = false;
  private probing = false;
  private running = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private livenessTimer: ReturnType<typeof setInterval> | null = null;
  private lastSnapshot: StateSnapshotEvent | null = null;

  private url: string;
  private transportFactory: TransportFactory;
  private backoff: BackoffPolicy;
  private livenessIntervalMs: number;
  private logger: CliLogger;
  private throttle: RenderThrottle<StateSnapshotEvent>;

  constructor(options: ClientSessionOptions) {
    super();
    this.url = options.url;
    this.transportFactory = options.transportFactory ?? createWebSocketTransport;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.livenessIntervalMs = options.livenessIntervalMs ?? 5000;
    this.logger = options.logger ?? defaultLogger;
    this.throttle = new RenderThrottle(options.renderWindowMs ?? 500, (snapshot) =>
      this.emit("render", snapshot)
    );
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    // A restart is a fresh cycle with the full retry budget
    this.attempts = 0;
    this.exhausted = false;
    this.probing = false;
    this.livenessTimer = setInterval(() => this.checkLiveness(), this.livenessIntervalMs);
    this.connect();
  }

  stop(): void {
    this.running = false;
    this.probing = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.livenessTimer) {
      clearInterval(this.livenessTimer);
      this.livenessTimer = null;
    }
    this.throttle.cancel();

    const transport = this.transport;
    this.transport = null;
    transport?.close();
    this.setState("disconnected");
  }

  getState(): SessionState {
    return this.state;
  }

  /** Retries spent since the last successful connection. */
  getAttempts(): number {
    return this.attempts;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  getLastSnapshot(): StateSnapshotEvent | null {
    return this.lastSnapshot;
  }

  send(command: ClientCommand): boolean {
    if (this.state !== "connected" || !this.transport) {
      return false;
    }
    try {
      this.transport.send(command);
      return true;
    } catch (error) {
      this.logger.warn(
        { error: serializeError(error), commandType: command.type },
        "Failed to send command"
      );
      return false;
    }
  }

  private setState(state: SessionState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit("state", state);
  }

  private connect(): void {
    this.setState("connecting");

    let transport: Transport;
    try {
      transport = this.transportFactory(this.url);
    } catch (error) {
      this.logger.error({ error: serializeError(error), url: this.url }, "Cannot open connection");
      this.handleClose(1006, "transport could not be created");
      return;
    }
    this.transport = transport;

    transport.on("open", () => {
      if (this.transport !== transport) return;
      this.logger.info({ url: this.url }, "Connected to controller");
      this.attempts = 0; // Reset reconnect counter on successful connection
      this.exhausted = false;
      this.probing = false;
      this.setState("connected");
    });

    transport.on("message", (raw: string) => {
      if (this.transport !== transport) return;
      this.handleFrame(raw);
    });

    transport.on("error", (error: unknown) => {
      this.logger.debug({ error: serializeError(error) }, "Transport error");
    });

    transport.on("close", (code: number, reason: string) => {
      if (this.transport !== transport) return;
      this.transport = null;
      this.handleClose(code, reason);
    });
  }

  private handleClose(code: number, reason: string): void {
    if (!this.running) return;
    this.logger.warn({ code, reason }, "Disconnected from controller");

    // A failed liveness probe leaves the session where it was
    if (this.probing) {
      this.probing = false;
      this.setState("disconnected");
      return;
    }

    if (this.attempts >= this.backoff.maxAttempts) {
      this.logger.error(
        { attempts: this.attempts },
        "Max reconnection attempts reached, waiting for liveness check"
      );
      this.exhausted = true;
      this.setState("disconnected");
      return;
    }

    // Calculate delay with exponential backoff
    const delay = backoffDelay(this.attempts, this.backoff);
    this.attempts++;

    this.logger.info({ attempt: this.attempts, delay }, "Scheduling reconnect");
    this.setState("reconnecting");

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private checkLiveness(): void {
    if (!this.exhausted || this.probing || this.state !== "disconnected") {
      return;
    }
    this.logger.info({ url: this.url }, "Probing controller");
    this.probing = true;
    this.connect();
  }

  private handleFrame(raw: string): void {
    const result = decodeServerEvent(raw);
    if (!result.ok) {
      this.logger.warn({ reason: result.reason, message: result.message }, "Dropped server frame");
      return;
    }

    const event = result.value;
    switch (event.type) {
      case "system_status":
        this.lastSnapshot = event;
        this.throttle.push(event);
        break;
      case "ai_inference_result": {
        const payload: InferenceResultPayload = event.data;
        this.emit("inference", payload);
        break;
      }
      case "error": {
        const error: ServerError = event.data;
        this.emit("serverError", error);
        break;
      }
    }
  }
}
