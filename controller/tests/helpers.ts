import sharp from "sharp";
import { decodeServerEvent, type ServerEvent } from "@edgepulse/protocol";
import type { SessionSocket } from "../src/services/broadcast-hub";
import { PinoLogger } from "../src/services/logger";

export class FakeSocket implements SessionSocket {
  readyState = 1;
  sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  failOnSend = false;

  send(data: string): void {
    if (this.failOnSend) {
      throw new Error("socket write failed");
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closedWith = { code, reason };
  }

  events(): ServerEvent[] {
    return this.sent.map((frame) => {
      const result = decodeServerEvent(frame);
      if (!result.ok) {
        throw new Error(`socket received an invalid frame: ${result.message}`);
      }
      return result.value;
    });
  }
}

export interface CapturedLogger {
  logger: PinoLogger;
  lines: () => Record<string, unknown>[];
}

export function captureLogger(level = "debug"): CapturedLogger {
  const raw: string[] = [];
  const logger = new PinoLogger({
    level,
    destination: {
      write(msg: string) {
        raw.push(msg);
      },
    },
  });
  return {
    logger,
    lines: () => raw.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export function silentLogger(): PinoLogger {
  return new PinoLogger({ level: "silent" });
}

export function constant(value: number): () => number {
  return () => value;
}

export function solidImage(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 255, g: 0, b: 0 },
    },
  })
    .png()
    .toBuffer();
}
