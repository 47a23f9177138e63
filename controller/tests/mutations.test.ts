import { describe, test, expect } from "vitest";
import type { SystemState } from "@edgepulse/protocol";
import { applyMutation, type StateMutation } from "../src/simulation/mutations";
import { createInitialState } from "../src/simulation/initial-state";
import { mulberry32 } from "../src/simulation/random";
import { constant } from "./helpers";

function expectWithinBounds(state: SystemState) {
  for (const core of Object.values(state.cpu.cores)) {
    expect(core.usagePct).toBeGreaterThanOrEqual(0);
    expect(core.usagePct).toBeLessThanOrEqual(100);
  }
  expect(state.memory.usedMB).toBeGreaterThanOrEqual(0);
  expect(state.memory.usedMB).toBeLessThanOrEqual(state.memory.totalMB);
  expect(state.memory.pressurePct).toBeGreaterThanOrEqual(0);
  expect(state.memory.pressurePct).toBeLessThanOrEqual(100);
  expect(state.memory.fragmentationPct).toBeGreaterThanOrEqual(0);
  expect(state.memory.fragmentationPct).toBeLessThanOrEqual(100);
  expect(state.ai.npuUsagePct).toBeGreaterThanOrEqual(0);
  expect(state.ai.npuUsagePct).toBeLessThanOrEqual(100);
}

describe("applyMutation", () => {
  describe("defragment", () => {
    test("reduces fragmentation and pressure toward their floors", () => {
      const next = applyMutation(createInitialState(), { type: "defragment" }, constant(0));

      expect(next.memory.totalMB).toBe(8192);
      expect(next.memory.usedMB).toBe(2048);
      expect(next.memory.fragmentationPct).toBe(5);
      expect(next.memory.pressurePct).toBe(20);
    });

    test("never raises a value already below its floor", () => {
      const state = createInitialState();
      state.memory.fragmentationPct = 3;
      state.memory.pressurePct = 7;

      const next = applyMutation(state, { type: "defragment" }, constant(0));

      expect(next.memory.fragmentationPct).toBe(3);
      expect(next.memory.pressurePct).toBe(7);
    });

    test("settles at the floors when applied repeatedly", () => {
      let state = createInitialState();
      for (let i = 0; i < 10; i++) {
        state = applyMutation(state, { type: "defragment" }, constant(0));
      }

      expect(state.memory.fragmentationPct).toBe(5);
      expect(state.memory.pressurePct).toBe(10);
    });
  });

  describe("setFrequencyMode", () => {
    test("sets per-cluster frequencies for high mode", () => {
      const next = applyMutation(
        createInitialState(),
        { type: "setFrequencyMode", mode: "high" },
        constant(0)
      );

      expect(next.cpu.frequencyMode).toBe("high");
      expect(next.cpu.cores["A76-0"]?.frequencyMHz).toBe(2400);
      expect(next.cpu.cores["A76-1"]?.frequencyMHz).toBe(2400);
      expect(next.cpu.cores["A55-0"]?.frequencyMHz).toBe(1800);
      expect(next.cpu.cores["A55-1"]?.frequencyMHz).toBe(1800);
    });

    test("is idempotent", () => {
      const mutation: StateMutation = { type: "setFrequencyMode", mode: "low" };
      const once = applyMutation(createInitialState(), mutation, constant(0));
      const twice = applyMutation(once, mutation, constant(0));

      expect(twice).toEqual(once);
      expect(once.cpu.cores["A76-0"]?.frequencyMHz).toBe(1200);
      expect(once.cpu.cores["A55-0"]?.frequencyMHz).toBe(1000);
    });

    test("leaves cores outside the known clusters untouched", () => {
      const state = createInitialState();
      state.cpu.cores["X1-0"] = { usagePct: 10, frequencyMHz: 3000, temperatureC: 40 };

      const next = applyMutation(state, { type: "setFrequencyMode", mode: "low" }, constant(0));

      expect(next.cpu.cores["X1-0"]?.frequencyMHz).toBe(3000);
    });
  });

  describe("tick", () => {
    test("walks idle telemetry with a centred draw", () => {
      const next = applyMutation(createInitialState(), { type: "tick" }, constant(0.5));

      expect(next.cpu.cores["A76-0"]).toEqual({
        usagePct: 15,
        frequencyMHz: 1800,
        temperatureC: 45,
      });
      expect(next.memory).toEqual({
        totalMB: 8192,
        usedMB: 2048,
        pressurePct: 25,
        fragmentationPct: 12.5,
        allocationCount: 1577,
      });
      expect(next.ai).toEqual(createInitialState().ai);
    });

    test("drives NPU and detections while inference runs", () => {
      const running = applyMutation(
        createInitialState(),
        { type: "setRunning", running: true },
        constant(0)
      );
      const next = applyMutation(running, { type: "tick" }, constant(0.5));

      expect(next.cpu.cores["A76-0"]?.usagePct).toBe(17.5);
      expect(next.ai.npuUsagePct).toBe(40);
      expect(next.ai.inferenceLatencyMs).toBe(50);
      expect(next.ai.detectionCount).toBe(5);
    });

    test("caps busy cores and the NPU at 95", () => {
      let state = applyMutation(
        createInitialState(),
        { type: "setRunning", running: true },
        constant(0)
      );
      for (let i = 0; i < 40; i++) {
        state = applyMutation(state, { type: "tick" }, constant(0.99));
      }

      for (const core of Object.values(state.cpu.cores)) {
        expect(core.usagePct).toBe(95);
      }
      expect(state.ai.npuUsagePct).toBe(95);
    });

    test("keeps every value in range across long mixed sequences", () => {
      const mutations: StateMutation[] = [
        { type: "tick" },
        { type: "defragment" },
        { type: "setFrequencyMode", mode: "high" },
        { type: "setRunning", running: true },
        { type: "tick" },
        { type: "setRunning", running: false },
        { type: "setFrequencyMode", mode: "low" },
      ];

      for (const seed of [1, 42, 9001]) {
        const random = mulberry32(seed);
        let state = createInitialState();
        for (let i = 0; i < 300; i++) {
          const mutation = mutations[Math.floor(random() * mutations.length)] ?? { type: "tick" };
          state = applyMutation(state, mutation, random);
          expectWithinBounds(state);
        }
        expect(state.memory.usedMB).toBeGreaterThanOrEqual(512);
        expect(state.memory.usedMB).toBeLessThanOrEqual(8192 - 512);
        expect(state.memory.pressurePct).toBeGreaterThanOrEqual(10);
        expect(state.memory.pressurePct).toBeLessThanOrEqual(90);
      }
    });

    test("does not modify the input state", () => {
      const state = createInitialState();
      const before = structuredClone(state);

      applyMutation(state, { type: "tick" }, mulberry32(7));

      expect(state).toEqual(before);
    });
  });

  describe("setRunning", () => {
    test("resets the NPU on stop and keeps the last detection count", () => {
      let state = applyMutation(
        createInitialState(),
        { type: "setRunning", running: true },
        constant(0)
      );
      state = applyMutation(state, { type: "tick" }, constant(0.5));
      state = applyMutation(state, { type: "setRunning", running: false }, constant(0));

      expect(state.ai.isRunning).toBe(false);
      expect(state.ai.npuUsagePct).toBe(35);
      expect(state.ai.detectionCount).toBe(5);
    });

    test("is a no-op when the flag does not change", () => {
      const state = createInitialState();
      const next = applyMutation(state, { type: "setRunning", running: false }, constant(0));

      expect(next).toEqual(state);
    });
  });

  test("recordDetections floors the count at zero", () => {
    const state = createInitialState();

    expect(
      applyMutation(state, { type: "recordDetections", count: 3.7 }, constant(0)).ai
        .detectionCount
    ).toBe(3);
    expect(
      applyMutation(state, { type: "recordDetections", count: -2 }, constant(0)).ai
        .detectionCount
    ).toBe(0);
  });
});
