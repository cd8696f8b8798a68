import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { DailyAggregate, DailyEnergyBalance } from "./types.js";

const LOCAL_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}/;

const calendarDays = (
  timestamps: readonly string[],
  seriesLength: number
): Effect.Effect<readonly string[], InputError> => {
  if (timestamps.length === 0) {
    return Effect.fail(new InputError({ message: "Cannot aggregate an empty series" }));
  }
  if (timestamps.length !== seriesLength) {
    return Effect.fail(
      new InputError({
        message: `Timestamps (${timestamps.length}) and values (${seriesLength}) differ in length`,
      })
    );
  }

  const days: string[] = [];
  for (const timestamp of timestamps) {
    const match = LOCAL_TIMESTAMP.exec(timestamp);
    if (!match) {
      return Effect.fail(new InputError({ message: `Malformed timestamp "${timestamp}"` }));
    }
    days.push(match[1]);
  }
  return Effect.succeed(days);
};

// Hours are one hour long, so summing kW gives kWh.
export const aggregateDaily = (
  timestamps: readonly string[],
  netLoadKw: readonly number[]
): Effect.Effect<readonly DailyAggregate[], InputError> =>
  Effect.map(calendarDays(timestamps, netLoadKw.length), (days) => {
    const totals = new Map<string, { surplusKwh: number; deficitKwh: number }>();

    days.forEach((date, i) => {
      const day = totals.get(date) ?? { surplusKwh: 0, deficitKwh: 0 };
      const net = netLoadKw[i];
      if (net < 0) {
        day.surplusKwh += -net;
      } else if (net > 0) {
        day.deficitKwh += net;
      }
      totals.set(date, day);
    });

    return Array.from(totals, ([date, { surplusKwh, deficitKwh }]) => ({
      date,
      surplusKwh,
      deficitKwh,
      effectiveStorageKwh: Math.min(surplusKwh, deficitKwh),
    }));
  });

export const dailyEnergyBalance = (
  timestamps: readonly string[],
  generationKw: readonly number[],
  loadKw: readonly number[]
): Effect.Effect<readonly DailyEnergyBalance[], InputError> => {
  if (generationKw.length !== loadKw.length) {
    return Effect.fail(
      new InputError({
        message: `Generation (${generationKw.length}) and load (${loadKw.length}) series differ in length`,
      })
    );
  }

  return Effect.map(calendarDays(timestamps, loadKw.length), (days) => {
    const totals = new Map<string, { generationKwh: number; loadKwh: number }>();

    days.forEach((date, i) => {
      const day = totals.get(date) ?? { generationKwh: 0, loadKwh: 0 };
      day.generationKwh += generationKw[i];
      day.loadKwh += loadKw[i];
      totals.set(date, day);
    });

    return Array.from(totals, ([date, day]) => ({ date, ...day }));
  });
};
