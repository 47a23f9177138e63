import type { SystemState, StateSnapshotEvent } from "@edgepulse/protocol";
import { applyMutation, type StateMutation } from "../simulation/mutations";
import {
  createInitialState,
  DEFAULT_LIMITS,
  type SimulationLimits,
} from "../simulation/initial-state";
import type { RandomSource } from "../simulation/random";

export interface StateStoreOptions {
  random: RandomSource;
  initialState?: SystemState;
  limits?: SimulationLimits;
}

/**
 * Sole owner of the telemetry document. Callers only ever see copies, and
 * every write goes through {@link StateStore.apply}.
 */
export class StateStore {
  private state: SystemState;
  private revision = 0;
  private random: RandomSource;
  private limits: SimulationLimits;

  constructor(options: StateStoreOptions) {
    this.random = options.random;
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.state = structuredClone(options.initialState ?? createInitialState());
  }

  get(): SystemState {
    return structuredClone(this.state);
  }

  /** Number of mutations applied so far; doubles as the snapshot sequence number. */
  getRevision(): number {
    return this.revision;
  }

  apply(mutation: StateMutation): SystemState {
    this.state = applyMutation(this.state, mutation, this.random, this.limits);
    this.revision++;
    return this.get();
  }

  snapshot(): StateSnapshotEvent {
    return { type: "system_status", seq: this.revision, data: this.get() };
  }
}
