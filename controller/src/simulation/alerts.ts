import type { SystemState } from "@edgepulse/protocol";
import type { AlertThresholds } from "../config";

export type AlertMetric = "cpuTemperature" | "cpuUsage" | "memoryPressure";

export interface AlertReading {
  metric: AlertMetric;
  value: number;
  threshold: number;
  exceeded: boolean;
}

function hottest(values: number[]): number {
  return values.length === 0 ? 0 : Math.max(...values);
}

export function readAlertMetrics(
  state: SystemState,
  thresholds: AlertThresholds
): AlertReading[] {
  const cores = Object.values(state.cpu.cores);
  const readings: Array<Omit<AlertReading, "exceeded">> = [
    {
      metric: "cpuTemperature",
      value: hottest(cores.map((core) => core.temperatureC)),
      threshold: thresholds.cpuTemperatureC,
    },
    {
      metric: "cpuUsage",
      value: hottest(cores.map((core) => core.usagePct)),
      threshold: thresholds.cpuUsagePct,
    },
    {
      metric: "memoryPressure",
      value: state.memory.pressurePct,
      threshold: thresholds.memoryPressurePct,
    },
  ];
  return readings.map((reading) => ({
    ...reading,
    exceeded: reading.value > reading.threshold,
  }));
}
