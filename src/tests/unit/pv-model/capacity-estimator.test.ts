import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import { estimateCapacity } from "../../../pv-model/index.js";

describe("capacity-estimator", () => {
  it.effect("should use 60 W/m² for ground-mounted arrays", () =>
    Effect.gen(function* () {
      const estimate = yield* estimateCapacity(5000, "ground");

      expect(estimate).toEqual({ capacityKw: 300, powerDensityWm2: 60 });
    })
  );

  it.effect("should use 110 W/m² for rooftop arrays", () =>
    Effect.gen(function* () {
      const estimate = yield* estimateCapacity(1000, "rooftop");

      expect(estimate).toEqual({ capacityKw: 110, powerDensityWm2: 110 });
    })
  );

  it.effect("should reject a non-positive area", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(estimateCapacity(-5, "ground"));

      expect(error.message).toBe("Buildable area must be > 0 m², got -5");
    })
  );
});
