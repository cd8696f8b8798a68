import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import { percentile } from "./percentile.js";
import type { DailyAggregate, StorageRecommendation } from "./types.js";

export const NOISE_FLOOR_KWH = 1; // idle or overcast days
export const SIZING_PERCENTILE = 0.9; // ignore the rarest days
export const USABLE_DEPTH_OF_DISCHARGE = 0.9;
export const STORAGE_DURATION_HOURS = 2;

export const recommendStorage = (
  daily: readonly DailyAggregate[]
): Effect.Effect<StorageRecommendation, InputError> => {
  if (daily.length === 0) {
    return Effect.fail(new InputError({ message: "No days to size storage from" }));
  }

  const retained = daily
    .map((day) => day.effectiveStorageKwh)
    .filter((kwh) => kwh > NOISE_FLOOR_KWH);

  if (retained.length === 0) {
    return Effect.succeed<StorageRecommendation>({ _tag: "NoStorageWarranted", consideredDays: daily.length });
  }

  return Effect.map(
    percentile(retained, SIZING_PERCENTILE),
    (sizingPercentileKwh): StorageRecommendation => {
      const recommendedEnergyKwh = sizingPercentileKwh / USABLE_DEPTH_OF_DISCHARGE;
      return {
        _tag: "Recommended",
        recommendedEnergyKwh,
        recommendedPowerKw: recommendedEnergyKwh / STORAGE_DURATION_HOURS,
        sizingPercentileKwh,
        retainedDays: retained.length,
        consideredDays: daily.length,
      };
    }
  );
};
