import type { FrequencyMode, SystemState } from "@edgepulse/protocol";

/** Per-cluster core clocks in MHz. The cluster is the core-id prefix before `-`. */
export type FrequencyTable = Record<FrequencyMode, Record<string, number>>;

export const FREQUENCY_TABLE: FrequencyTable = {
  high: { A76: 2400, A55: 1800 },
  normal: { A76: 1800, A55: 1400 },
  low: { A76: 1200, A55: 1000 },
};

export interface SimulationLimits {
  frequencyTable: FrequencyTable;
  fragmentationFloorPct: number;
  pressureFloorPct: number;
  defragFragmentationStepPct: number;
  defragPressureStepPct: number;
  npuCeilingPct: number;
  npuIdlePct: number;
  busyCoreCeilingPct: number;
  idleCoreFloorPct: number;
  memoryReserveMB: number;
  pressureCeilingPct: number;
}

export const DEFAULT_LIMITS: SimulationLimits = {
  frequencyTable: FREQUENCY_TABLE,
  fragmentationFloorPct: 5,
  pressureFloorPct: 10,
  defragFragmentationStepPct: 8,
  defragPressureStepPct: 5,
  npuCeilingPct: 95,
  npuIdlePct: 35,
  busyCoreCeilingPct: 95,
  idleCoreFloorPct: 5,
  memoryReserveMB: 512,
  pressureCeilingPct: 90,
};

export function createInitialState(): SystemState {
  return {
    cpu: {
      cores: {
        "A76-0": { usagePct: 15, frequencyMHz: 1800, temperatureC: 45 },
        "A76-1": { usagePct: 22, frequencyMHz: 1800, temperatureC: 47 },
        "A55-0": { usagePct: 8, frequencyMHz: 1400, temperatureC: 42 },
        "A55-1": { usagePct: 5, frequencyMHz: 1400, temperatureC: 41 },
      },
      frequencyMode: "normal",
    },
    memory: {
      totalMB: 8192,
      usedMB: 2048,
      pressurePct: 25,
      fragmentationPct: 12,
      allocationCount: 1567,
    },
    ai: {
      npuUsagePct: 35,
      inferenceLatencyMs: 45,
      batchSize: 1,
      detectionCount: 0,
      isRunning: false,
    },
    drivers: {
      usb: "connected",
      mipi: "active",
      dma: "idle",
    },
  };
}
