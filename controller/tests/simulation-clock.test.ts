import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { BroadcastHub } from "../src/services/broadcast-hub";
import { SimulationClock } from "../src/services/simulation-clock";
import { StateStore } from "../src/services/state-store";
import { createInitialState } from "../src/simulation/initial-state";
import { mulberry32 } from "../src/simulation/random";
import { FakeSocket, captureLogger, constant, silentLogger } from "./helpers";

const ALERTS = { cpuTemperatureC: 75, cpuUsagePct: 80, memoryPressurePct: 80 };

describe("SimulationClock", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("N intervals deliver N snapshots in tick order", () => {
    const logger = silentLogger();
    const store = new StateStore({ random: mulberry32(3) });
    const hub = new BroadcastHub(logger);
    const socket = new FakeSocket();
    hub.register({ id: "s1", socket, connectedAt: 0, lastSeen: 0 });
    const clock = new SimulationClock(store, hub, logger, {
      intervalMs: 3000,
      alerts: ALERTS,
    });

    clock.start();
    vi.advanceTimersByTime(3000 * 4);
    clock.stop();

    const seqs = socket
      .events()
      .map((event) => (event.type === "system_status" ? event.seq : -1));
    expect(seqs).toEqual([1, 2, 3, 4]);
  });

  test("start is idempotent and stop halts ticking", () => {
    const logger = silentLogger();
    const store = new StateStore({ random: constant(0.5) });
    const clock = new SimulationClock(store, new BroadcastHub(logger), logger, {
      intervalMs: 1000,
      alerts: ALERTS,
    });

    clock.start();
    clock.start();
    expect(clock.isRunning()).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(store.getRevision()).toBe(1);

    clock.stop();
    expect(clock.isRunning()).toBe(false);
    vi.advanceTimersByTime(5000);
    expect(store.getRevision()).toBe(1);
  });

  test("logs alerts once on each threshold crossing", () => {
    const { logger, lines } = captureLogger("info");
    const initialState = createInitialState();
    initialState.memory.pressurePct = 85;
    const store = new StateStore({ random: constant(0), initialState });
    const clock = new SimulationClock(store, new BroadcastHub(logger), logger, {
      intervalMs: 1000,
      alerts: ALERTS,
    });

    clock.tick(); // pressure 82.5
    clock.tick(); // pressure 80, at the threshold
    store.apply({ type: "defragment" }); // 75
    clock.tick(); // 72.5

    const alerts = lines()
      .filter((line) => line.event === "alert_raised" || line.event === "alert_cleared")
      .map((line) => [line.event, line.metric, line.value]);

    expect(alerts).toEqual([
      ["alert_raised", "memoryPressure", 82.5],
      ["alert_cleared", "memoryPressure", 80],
    ]);
  });
});
