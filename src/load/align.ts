import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { AlignedLoad } from "./types.js";

const HOURS_PER_DAY = 24;

// Truncates or cyclically repeats a raw load sequence onto `targetLength` hourly slots.
// No calendar alignment is attempted; a tile always restarts at raw index 0.
export const alignLoadSeries = (
  raw: readonly number[],
  targetLength: number
): Effect.Effect<AlignedLoad, InputError> => {
  if (raw.length === 0) {
    return Effect.fail(new InputError({ message: "Load series is empty" }));
  }
  if (!Number.isInteger(targetLength) || targetLength < 1) {
    return Effect.fail(
      new InputError({ message: `Target length must be a positive integer, got ${targetLength}` })
    );
  }
  const invalidIndex = raw.findIndex((value) => !Number.isFinite(value));
  if (invalidIndex !== -1) {
    return Effect.fail(
      new InputError({ message: `Load value at index ${invalidIndex} is not a finite number` })
    );
  }

  if (raw.length >= targetLength) {
    return Effect.succeed<AlignedLoad>({
      values: raw.slice(0, targetLength),
      rawLength: raw.length,
      strategy: raw.length === targetLength ? "Exact" : "Truncated",
      phaseShifted: false,
    });
  }

  const values = Array.from({ length: targetLength }, (_, i) => raw[i % raw.length]);
  return Effect.succeed<AlignedLoad>({
    values,
    rawLength: raw.length,
    strategy: "Tiled",
    phaseShifted: raw.length % HOURS_PER_DAY !== 0,
  });
};
