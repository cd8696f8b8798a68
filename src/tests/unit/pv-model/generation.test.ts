import { describe, it, expect } from "@effect/vitest";
import { Effect, Exit } from "effect";
import {
  cellTemperature,
  generationKw,
  makeStationConfig,
  simulateGeneration,
  temperatureCorrection,
  type StationConfig,
} from "../../../pv-model/index.js";
import { InputError } from "../../../errors/input.error.js";

describe("pv-model", () => {
  const station: StationConfig = {
    capacityKw: 100,
    performanceRatio: 0.82,
    temperatureCoefficient: -0.004,
    cellTempOffsetCoefficient: 0.025,
  };

  describe("cellTemperature", () => {
    it("should add 0.025 °C per W/m² to ambient", () => {
      const sample = { timestamp: "2024-06-01T12:00", ambientTemperatureC: 20, irradianceWm2: 800 };

      // 20 + 0.025 * 800 = 40
      expect(cellTemperature(sample, station)).toBeCloseTo(40, 10);
    });
  });

  describe("temperatureCorrection", () => {
    it("should be exactly 1 at 25 °C", () => {
      expect(temperatureCorrection(25, station)).toBe(1);
    });

    it("should exceed 1 in the cold and is not clamped", () => {
      // 1 - 0.004 * (-15 - 25) = 1.16
      expect(temperatureCorrection(-15, station)).toBeCloseTo(1.16, 10);
    });

    it("should drop below 1 in the heat", () => {
      // 1 - 0.004 * (75 - 25) = 0.8
      expect(temperatureCorrection(75, station)).toBeCloseTo(0.8, 10);
    });
  });

  describe("generationKw", () => {
    it("should return 0 at zero irradiance regardless of temperature", () => {
      for (const ambientTemperatureC of [-50, -10, 0, 25, 60]) {
        expect(
          generationKw({ timestamp: "2024-06-01T00:00", ambientTemperatureC, irradianceWm2: 0 }, station)
        ).toBe(0);
      }
    });

    it("should equal capacity * G/1000 * PR when the cell is at 25 °C", () => {
      // cell = 10 + 0.025 * 600 = 25
      const sample = { timestamp: "2024-06-01T10:00", ambientTemperatureC: 10, irradianceWm2: 600 };

      expect(generationKw(sample, station)).toBeCloseTo(100 * 0.6 * 0.82, 10);
    });

    it("should apply the temperature loss on hot cells", () => {
      // cell = 25 + 0.025 * 1000 = 50, correction = 0.9
      const sample = { timestamp: "2024-06-01T12:00", ambientTemperatureC: 25, irradianceWm2: 1000 };

      expect(generationKw(sample, station)).toBeCloseTo(73.8, 10);
    });

    it("should clamp negative output to 0", () => {
      // a correction below 0 needs a cell above 275 °C
      const sample = { timestamp: "2024-06-01T12:00", ambientTemperatureC: 300, irradianceWm2: 10 };

      expect(generationKw(sample, station)).toBe(0);
    });

    it("should never be negative across the plausible input range", () => {
      for (let ambientTemperatureC = -50; ambientTemperatureC <= 60; ambientTemperatureC += 5) {
        for (let irradianceWm2 = 0; irradianceWm2 <= 1500; irradianceWm2 += 50) {
          const output = generationKw(
            { timestamp: "2024-06-01T12:00", ambientTemperatureC, irradianceWm2 },
            station
          );
          expect(output).toBeGreaterThanOrEqual(0);
        }
      }
    });
  });

  describe("simulateGeneration", () => {
    it("should keep length and order of the weather series", () => {
      const samples = [
        { timestamp: "2024-06-01T00:00", ambientTemperatureC: 15, irradianceWm2: 0 },
        { timestamp: "2024-06-01T01:00", ambientTemperatureC: 0, irradianceWm2: 1000 },
        { timestamp: "2024-06-01T02:00", ambientTemperatureC: 15, irradianceWm2: 0 },
      ];

      const series = simulateGeneration(samples, station);

      expect(series).toHaveLength(3);
      expect(series[0]).toBe(0);
      expect(series[1]).toBe(82);
      expect(series[2]).toBe(0);
    });
  });

  describe("makeStationConfig", () => {
    it.effect("should fill in the fixed temperature constants", () =>
      Effect.gen(function* () {
        const config = yield* makeStationConfig(250, 0.8);

        expect(config).toEqual({
          capacityKw: 250,
          performanceRatio: 0.8,
          temperatureCoefficient: -0.004,
          cellTempOffsetCoefficient: 0.025,
        });
      })
    );

    it.effect("should reject a non-positive capacity", () =>
      Effect.gen(function* () {
        const result = yield* Effect.exit(makeStationConfig(0, 0.8));

        expect(result).toEqual(
          Exit.fail(new InputError({ message: "Capacity must be > 0 kW, got 0" }))
        );
      })
    );

    it.effect("should reject a performance ratio outside (0, 1)", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(makeStationConfig(100, 1));

        expect(error._tag).toBe("InputError");
        expect(error.message).toBe("Performance ratio must be within (0, 1), got 1");
      })
    );
  });
});
