import type { CpuCore, FrequencyMode, SystemState } from "@edgepulse/protocol";
import { DEFAULT_LIMITS, type SimulationLimits } from "./initial-state";
import type { RandomSource } from "./random";

export type StateMutation =
  | { type: "tick" }
  | { type: "setFrequencyMode"; mode: FrequencyMode }
  | { type: "defragment" }
  | { type: "setRunning"; running: boolean }
  | { type: "recordDetections"; count: number };

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function mapCores(
  cores: Record<string, CpuCore>,
  fn: (id: string, core: CpuCore) => CpuCore
): Record<string, CpuCore> {
  const next: Record<string, CpuCore> = {};
  for (const [id, core] of Object.entries(cores)) {
    next[id] = fn(id, core);
  }
  return next;
}

function clusterOf(coreId: string): string {
  const dash = coreId.indexOf("-");
  return dash === -1 ? coreId : coreId.slice(0, dash);
}

function tick(
  state: SystemState,
  random: RandomSource,
  limits: SimulationLimits
): SystemState {
  const running = state.ai.isRunning;

  const cores = mapCores(state.cpu.cores, (_id, core) => {
    const usage = running
      ? Math.min(limits.busyCoreCeilingPct, core.usagePct + random() * 5)
      : clamp(core.usagePct + (random() - 0.5) * 10, limits.idleCoreFloorPct, 100);
    return {
      ...core,
      usagePct: round1(clamp(usage, 0, 100)),
      temperatureC: round1(40 + random() * 10),
    };
  });

  const { memory } = state;
  const lowerMB = Math.min(limits.memoryReserveMB, memory.totalMB);
  const upperMB = Math.max(lowerMB, memory.totalMB - limits.memoryReserveMB);
  const nextMemory = {
    ...memory,
    usedMB: Math.round(clamp(memory.usedMB + (random() - 0.5) * 200, lowerMB, upperMB)),
    pressurePct: round1(
      clamp(
        memory.pressurePct + (random() - 0.5) * 5,
        limits.pressureFloorPct,
        limits.pressureCeilingPct
      )
    ),
    fragmentationPct: round1(clamp(memory.fragmentationPct + random(), 0, 100)),
    allocationCount: memory.allocationCount + Math.floor(random() * 20),
  };

  const ai = running
    ? {
        ...state.ai,
        npuUsagePct: round1(
          Math.min(limits.npuCeilingPct, state.ai.npuUsagePct + random() * 10)
        ),
        inferenceLatencyMs: round1(30 + random() * 40),
        detectionCount: Math.floor(random() * 10),
      }
    : { ...state.ai };

  return {
    cpu: { ...state.cpu, cores },
    memory: nextMemory,
    ai,
    drivers: { ...state.drivers },
  };
}

function setFrequencyMode(
  state: SystemState,
  mode: FrequencyMode,
  limits: SimulationLimits
): SystemState {
  const table = limits.frequencyTable[mode];
  return {
    ...state,
    cpu: {
      frequencyMode: mode,
      cores: mapCores(state.cpu.cores, (id, core) => {
        const frequencyMHz = table[clusterOf(id)];
        return frequencyMHz === undefined ? { ...core } : { ...core, frequencyMHz };
      }),
    },
  };
}

// A value already at or below its floor is left alone so the operation never raises it.
function reduceToward(value: number, step: number, floor: number): number {
  return value > floor ? Math.max(floor, value - step) : value;
}

function defragment(state: SystemState, limits: SimulationLimits): SystemState {
  return {
    ...state,
    memory: {
      ...state.memory,
      fragmentationPct: reduceToward(
        state.memory.fragmentationPct,
        limits.defragFragmentationStepPct,
        limits.fragmentationFloorPct
      ),
      pressurePct: reduceToward(
        state.memory.pressurePct,
        limits.defragPressureStepPct,
        limits.pressureFloorPct
      ),
    },
  };
}

function setRunning(
  state: SystemState,
  running: boolean,
  limits: SimulationLimits
): SystemState {
  if (state.ai.isRunning === running) {
    return { ...state, ai: { ...state.ai } };
  }
  return {
    ...state,
    ai: {
      ...state.ai,
      isRunning: running,
      // detectionCount stays frozen while stopped
      npuUsagePct: running ? state.ai.npuUsagePct : limits.npuIdlePct,
    },
  };
}

/**
 * Applies one mutation. Pure: the result depends only on the prior state,
 * the mutation and the values drawn from `random`.
 */
export function applyMutation(
  state: SystemState,
  mutation: StateMutation,
  random: RandomSource,
  limits: SimulationLimits = DEFAULT_LIMITS
): SystemState {
  switch (mutation.type) {
    case "tick":
      return tick(state, random, limits);
    case "setFrequencyMode":
      return setFrequencyMode(state, mutation.mode, limits);
    case "defragment":
      return defragment(state, limits);
    case "setRunning":
      return setRunning(state, mutation.running, limits);
    case "recordDetections":
      return {
        ...state,
        ai: {
          ...state.ai,
          detectionCount: Math.max(0, Math.floor(mutation.count)),
        },
      };
  }
}
