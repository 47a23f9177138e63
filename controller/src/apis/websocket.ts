import { decodeClientCommand } from "@edgepulse/protocol";
import type { BroadcastHub, SessionSocket } from "../services/broadcast-hub";
import type { CommandRouter } from "../services/command-router";
import type { Logger } from "../services/logger";
import type { StateStore } from "../services/state-store";
import {
  ConnectionLostError,
  MalformedCommandError,
  UnknownCommandError,
} from "../utils/errors";

// WebSocket Handler Interface
export interface WebSocketHandler {
  handleConnection(sessionId: string, ws: SessionSocket): void;
  handleMessage(sessionId: string, data: unknown): void;
  handleDisconnection(sessionId: string, code: number, reason: string): void;
  handleError(sessionId: string, error: Error): void;
  connectedSessions(): number;
  shutdown(): void;
}

// WebSocket Handler Implementation
export class TelemetryWebSocketHandler implements WebSocketHandler {
  constructor(
    private store: StateStore,
    private hub: BroadcastHub,
    private router: CommandRouter,
    private logger: Logger
  ) {}

  public handleConnection(sessionId: string, ws: SessionSocket): void {
    const now = Date.now();
    this.hub.register({ id: sessionId, socket: ws, connectedAt: now, lastSeen: now });
    this.logger.sessionConnected(sessionId, this.hub.size());

    // New sessions start from the current document rather than waiting for a tick
    this.hub.unicast(sessionId, this.store.snapshot());
  }

  public handleMessage(sessionId: string, data: unknown): void {
    if (!this.hub.getSession(sessionId)) {
      this.logger.commandRejected(
        sessionId,
        new ConnectionLostError(sessionId)
      );
      return;
    }

    if (typeof data !== "string") {
      this.logger.commandRejected(
        sessionId,
        new MalformedCommandError("binary frames are not supported")
      );
      return;
    }

    const result = decodeClientCommand(data);
    if (!result.ok) {
      const error =
        result.reason === "unknown_type"
          ? new UnknownCommandError(result.message)
          : new MalformedCommandError(result.message);
      this.logger.commandRejected(sessionId, error);
      return;
    }

    this.hub.touch(sessionId);
    this.logger.commandReceived(sessionId, result.value.type);
    this.router.handle(result.value, sessionId);
  }

  public handleDisconnection(sessionId: string, code: number, reason: string): void {
    this.hub.unregister(sessionId, reason || `Code: ${code}`);
  }

  public handleError(sessionId: string, error: Error): void {
    this.logger.sessionError(sessionId, error);
  }

  public connectedSessions(): number {
    return this.hub.size();
  }

  public shutdown(): void {
    this.hub.shutdown();
  }
}
