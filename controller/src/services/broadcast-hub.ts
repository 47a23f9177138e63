import { EventEmitter } from "events";
import { encodeFrame, type ServerEvent } from "@edgepulse/protocol";
import type { Logger } from "./logger";
import { ConnectionLostError } from "../utils/errors";

const WS_OPEN = 1;

/** The slice of a server-side socket the hub writes to. */
export interface SessionSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Session {
  id: string;
  socket: SessionSocket;
  connectedAt: number;
  lastSeen: number;
}

/**
 * Tracks open sessions and writes events to them. A session whose write fails
 * is dropped and its socket closed; `disconnection` is emitted with its id
 * whenever a session leaves.
 */
export class BroadcastHub extends EventEmitter {
  private sessions = new Map<string, Session>();

  constructor(private logger: Logger) {
    super();
  }

  register(session: Session): void {
    this.sessions.set(session.id, session);
    this.emit("connection", session.id);
  }

  unregister(sessionId: string, reason?: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger.sessionDisconnected(sessionId, reason);
      this.emit("disconnection", sessionId);
    }
    return removed;
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  getSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  size(): number {
    return this.sessions.size;
  }

  touch(sessionId: string, now: number = Date.now()): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastSeen = now;
    }
  }

  /** Returns the number of sessions the event was written to. */
  broadcast(event: ServerEvent): number {
    const frame = encodeFrame(event);
    let delivered = 0;
    for (const session of this.getSessions()) {
      if (this.deliver(session, frame)) delivered++;
    }
    return delivered;
  }

  unicast(sessionId: string, event: ServerEvent): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.debug("Unicast to unknown session dropped", {
        sessionId,
        eventType: event.type,
      });
      return false;
    }
    return this.deliver(session, encodeFrame(event));
  }

  shutdown(): void {
    this.logger.info("Shutting down broadcast hub", {
      sessions: this.sessions.size,
    });
    for (const session of this.getSessions()) {
      // Unregister first so in-flight work is cancelled before the close lands
      this.unregister(session.id, "server shutdown");
      this.closeSocket(session, 1001, "Server shutting down");
    }
  }

  private deliver(session: Session, frame: string): boolean {
    if (session.socket.readyState !== WS_OPEN) {
      this.drop(session, new ConnectionLostError(session.id));
      return false;
    }
    try {
      session.socket.send(frame);
      return true;
    } catch (error) {
      this.drop(
        session,
        new ConnectionLostError(
          session.id,
          error instanceof Error ? error : undefined
        )
      );
      return false;
    }
  }

  private drop(session: Session, error: ConnectionLostError): void {
    this.logger.sessionError(session.id, error);
    this.unregister(session.id, "send failed");
    this.closeSocket(session, 1011, "Send failed");
  }

  private closeSocket(session: Session, code: number, reason: string): void {
    try {
      session.socket.close(code, reason);
    } catch (error) {
      this.logger.debug("Socket close failed", {
        sessionId: session.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
