import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  computeNetLoad,
  makeBatteryConfig,
  simulateDispatch,
  type BatteryConfig,
} from "../../../dispatch/index.js";
import { InvariantViolationError } from "../../../errors/invariant-violation.error.js";

// Deterministic LCG so the property test is reproducible
const seededRandom = (seed: number) => {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
};

describe("simulateDispatch", () => {
  const battery = (energyCapacityKwh: number): BatteryConfig => ({
    energyCapacityKwh,
    maxCRate: 0.5,
    initialSocFraction: 0.5,
  });

  it("should charge up to headroom then discharge at the C-rate limit", () => {
    const result = simulateDispatch([-200, 200, 200], battery(100));

    expect(result.stateOfChargeKwh).toEqual([100, 50, 0]);
    expect(result.batteryPowerKw).toEqual([-50, 50, 50]);
    expect(result.gridPowerKw).toEqual([-150, 150, 150]);
  });

  it("should do nothing on balanced hours", () => {
    const result = simulateDispatch([0, 0], battery(100));

    expect(result.batteryPowerKw).toEqual([0, 0]);
    expect(result.stateOfChargeKwh).toEqual([50, 50]);
  });

  it("should cover small deficits and absorb small surpluses completely", () => {
    const result = simulateDispatch([10, -30, 5], battery(100));

    expect(result.batteryPowerKw).toEqual([10, -30, 5]);
    expect(result.stateOfChargeKwh).toEqual([40, 70, 65]);
    expect(result.gridPowerKw).toEqual([0, 0, 0]);
  });

  it("should not discharge an empty battery", () => {
    const result = simulateDispatch([60, 60, 60], battery(100));

    // 50 kWh to start, 50 kW rate: one full hour then nothing left
    expect(result.batteryPowerKw).toEqual([50, 0, 0]);
    expect(result.stateOfChargeKwh).toEqual([0, 0, 0]);
    expect(result.gridPowerKw).toEqual([10, 60, 60]);
  });

  it("should pass net load straight to the grid when capacity is 0", () => {
    const netLoad = [-12.5, 0, 7, 300, -1];
    const result = simulateDispatch(netLoad, battery(0));

    expect(result.batteryPowerKw).toEqual([0, 0, 0, 0, 0]);
    expect(result.stateOfChargeKwh).toEqual([0, 0, 0, 0, 0]);
    expect(result.gridPowerKw).toEqual(netLoad);
  });

  it("should keep state of charge within [0, capacity] for random net loads", () => {
    const random = seededRandom(42);
    const capacity = 100;
    const netLoad = Array.from({ length: 10_000 }, () => (random() - 0.5) * 400);

    const result = simulateDispatch(netLoad, battery(capacity));

    expect(result.stateOfChargeKwh).toHaveLength(10_000);
    for (let i = 0; i < netLoad.length; i++) {
      const soc = result.stateOfChargeKwh[i];
      expect(soc).toBeGreaterThanOrEqual(0);
      expect(soc).toBeLessThanOrEqual(capacity);
      expect(Math.abs(result.batteryPowerKw[i])).toBeLessThanOrEqual(capacity * 0.5);
    }
  });

  it("should throw an InvariantViolation when the battery starts outside its bounds", () => {
    const broken: BatteryConfig = { energyCapacityKwh: 100, maxCRate: 0.5, initialSocFraction: -1 };

    expect(() => simulateDispatch([0], broken)).toThrow(InvariantViolationError);
  });
});

describe("computeNetLoad", () => {
  it.effect("should subtract generation from load", () =>
    Effect.gen(function* () {
      const netLoad = yield* computeNetLoad([50, 50, 50], [0, 50, 80]);

      expect(netLoad).toEqual([50, 0, -30]);
    })
  );

  it.effect("should fail on mismatched lengths", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(computeNetLoad([1, 2, 3], [1, 2]));

      expect(error.message).toBe("Load (3) and generation (2) series differ in length");
    })
  );
});

describe("makeBatteryConfig", () => {
  it.effect("should fix the C-rate and initial state of charge", () =>
    Effect.gen(function* () {
      const config = yield* makeBatteryConfig(200);

      expect(config).toEqual({ energyCapacityKwh: 200, maxCRate: 0.5, initialSocFraction: 0.5 });
    })
  );

  it.effect("should reject a negative capacity", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeBatteryConfig(-1));

      expect(error._tag).toBe("InputError");
    })
  );
});
