import { EventEmitter } from "events";
import pino from "pino";
import {
  encodeFrame,
  type ClientCommand,
  type ServerEvent,
  type SystemState,
  type Transport,
} from "@edgepulse/protocol";

export class FakeTransport extends EventEmitter implements Transport {
  sent: ClientCommand[] = [];
  closed = false;

  constructor(public readonly url: string) {
    super();
  }

  send(command: ClientCommand): void {
    this.sent.push(command);
  }

  close(): void {
    this.closed = true;
  }

  receive(event: ServerEvent): void {
    this.emit("message", encodeFrame(event));
  }
}

export function fakeTransports() {
  const created: FakeTransport[] = [];
  const factory = (url: string) => {
    const transport = new FakeTransport(url);
    created.push(transport);
    return transport;
  };
  const latest = (): FakeTransport => {
    const transport = created[created.length - 1];
    if (!transport) throw new Error("no transport created yet");
    return transport;
  };
  return { created, factory, latest };
}

export const silentLogger = pino({ level: "silent" });

export function sampleState(): SystemState {
  return {
    cpu: {
      frequencyMode: "high",
      cores: {
        "A76-0": { usagePct: 42.5, frequencyMHz: 2400, temperatureC: 47.3 },
        "A55-0": { usagePct: 8, frequencyMHz: 1800, temperatureC: 41 },
      },
    },
    memory: {
      totalMB: 8192,
      usedMB: 3072,
      pressurePct: 37.5,
      fragmentationPct: 12,
      allocationCount: 1600,
    },
    ai: {
      npuUsagePct: 61.2,
      inferenceLatencyMs: 48.3,
      batchSize: 1,
      detectionCount: 4,
      isRunning: true,
    },
    drivers: { usb: "connected", mipi: "active", dma: "error" },
  };
}

const ANSI = new RegExp(String.fromCharCode(27) + "\\[[0-9;]*m", "g");

export function plain(frame: string | undefined): string {
  return (frame ?? "").replace(ANSI, "");
}
