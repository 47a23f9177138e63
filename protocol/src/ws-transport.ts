import { WebSocket, type ClientOptions, type RawData } from "ws";
import { EventEmitter } from "events";
import type { Transport } from "./transport";
import type { ClientCommand } from "./schemas";
import { encodeFrame } from "./codec";

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

export class WebSocketTransport extends EventEmitter implements Transport {
  private ws: WebSocket;

  constructor(url: string, options?: ClientOptions) {
    super();
    this.ws = new WebSocket(url, options);
    this.ws.on("open", () => this.emit("open"));
    this.ws.on("close", (code: number, reason: Buffer) =>
      this.emit("close", code, reason.toString("utf-8"))
    );
    this.ws.on("error", (err: Error) => this.emit("error", err));
    this.ws.on("message", (data: RawData, isBinary: boolean) => {
      // Telemetry frames are JSON text only
      if (isBinary) return;
      this.emit("message", rawDataToString(data));
    });
  }

  send(command: ClientCommand): void {
    this.ws.send(encodeFrame(command));
  }

  close(): void {
    this.ws.close();
  }
}

export const createWebSocketTransport = (url: string): Transport =>
  new WebSocketTransport(url);
