import type { StateSnapshotEvent } from "@edgepulse/protocol";
import type { AlertThresholds } from "../config";
import { readAlertMetrics, type AlertMetric } from "../simulation/alerts";
import type { BroadcastHub } from "./broadcast-hub";
import type { Logger } from "./logger";
import type { StateStore } from "./state-store";

/**
 * The one periodic writer of the process. Each fire advances the store by a
 * tick and fans the snapshot out to every session.
 */
export class SimulationClock {
  private interval: ReturnType<typeof setInterval> | null = null;
  private activeAlerts = new Set<AlertMetric>();

  constructor(
    private store: StateStore,
    private hub: BroadcastHub,
    private logger: Logger,
    private options: { intervalMs: number; alerts: AlertThresholds }
  ) {}

  start(): void {
    if (this.interval) {
      return; // Already ticking
    }

    this.interval = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);

    this.logger.info("Simulation clock started", {
      intervalMs: this.options.intervalMs,
    });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.logger.info("Simulation clock stopped");
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  tick(): StateSnapshotEvent {
    this.store.apply({ type: "tick" });
    const snapshot = this.store.snapshot();
    const delivered = this.hub.broadcast(snapshot);

    this.logger.debug("Simulation tick", {
      seq: snapshot.seq,
      delivered,
    });

    this.checkAlerts(snapshot);
    return snapshot;
  }

  private checkAlerts(snapshot: StateSnapshotEvent): void {
    for (const reading of readAlertMetrics(snapshot.data, this.options.alerts)) {
      const active = this.activeAlerts.has(reading.metric);
      if (reading.exceeded && !active) {
        this.activeAlerts.add(reading.metric);
        this.logger.alertRaised(reading.metric, reading.value, reading.threshold);
      } else if (!reading.exceeded && active) {
        this.activeAlerts.delete(reading.metric);
        this.logger.alertCleared(reading.metric, reading.value);
      }
    }
  }
}
