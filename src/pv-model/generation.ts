import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { HourlyWeatherSample } from "../weather/types.js";
import type { StationConfig } from "./types.js";

// Pure functions for converting irradiance and temperature into PV output

export const DEFAULT_TEMPERATURE_COEFFICIENT = -0.004;
export const DEFAULT_CELL_TEMP_OFFSET_COEFFICIENT = 0.025;
const STC_CELL_TEMPERATURE_C = 25;
const STC_IRRADIANCE_WM2 = 1000;

export const makeStationConfig = (
  capacityKw: number,
  performanceRatio: number
): Effect.Effect<StationConfig, InputError> => {
  if (!Number.isFinite(capacityKw) || capacityKw <= 0) {
    return Effect.fail(new InputError({ message: `Capacity must be > 0 kW, got ${capacityKw}` }));
  }
  if (!(performanceRatio > 0 && performanceRatio < 1)) {
    return Effect.fail(
      new InputError({ message: `Performance ratio must be within (0, 1), got ${performanceRatio}` })
    );
  }
  return Effect.succeed({
    capacityKw,
    performanceRatio,
    temperatureCoefficient: DEFAULT_TEMPERATURE_COEFFICIENT,
    cellTempOffsetCoefficient: DEFAULT_CELL_TEMP_OFFSET_COEFFICIENT,
  });
};

export const cellTemperature = (
  sample: HourlyWeatherSample,
  station: StationConfig
): number => sample.ambientTemperatureC + station.cellTempOffsetCoefficient * sample.irradianceWm2;

// Not clamped: above 1 in the cold, below 1 in the heat
export const temperatureCorrection = (cellTempC: number, station: StationConfig): number =>
  1 + station.temperatureCoefficient * (cellTempC - STC_CELL_TEMPERATURE_C);

export const generationKw = (sample: HourlyWeatherSample, station: StationConfig): number => {
  const correction = temperatureCorrection(cellTemperature(sample, station), station);
  const output =
    station.capacityKw *
    (sample.irradianceWm2 / STC_IRRADIANCE_WM2) *
    station.performanceRatio *
    correction;

  return Math.max(output, 0);
};

export const simulateGeneration = (
  samples: readonly HourlyWeatherSample[],
  station: StationConfig
): readonly number[] => samples.map((sample) => generationKw(sample, station));
