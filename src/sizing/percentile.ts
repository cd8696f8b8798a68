import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";

// Linear interpolation between closest ranks: rank = (n - 1) * q over the sorted values.
export const percentile = (
  values: readonly number[],
  q: number
): Effect.Effect<number, InputError> => {
  if (values.length === 0) {
    return Effect.fail(new InputError({ message: "Cannot take a percentile of an empty series" }));
  }
  if (!(q >= 0 && q <= 1)) {
    return Effect.fail(new InputError({ message: `Percentile must be within [0, 1], got ${q}` }));
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (sorted.length - 1) * q;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  return Effect.succeed(sorted[lower] + (rank - lower) * (sorted[upper] - sorted[lower]));
};
