import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";

const SHIFT_START_HOUR = 8;
const SHIFT_END_HOUR = 18; // inclusive
const SHIFT_LOAD_FACTOR = 0.6;
const BASE_LOAD_FACTOR = 0.1;

// Single-shift factory: 60% of PV capacity from 08:00 through 18:00, 10% otherwise.
export const factoryLoadProfile = (
  timestamps: readonly string[],
  capacityKw: number
): Effect.Effect<readonly number[], InputError> =>
  Effect.forEach(timestamps, (timestamp) => {
    const hour = Number.parseInt(timestamp.slice(11, 13), 10);
    if (Number.isNaN(hour) || hour < 0 || hour > 23) {
      return Effect.fail(new InputError({ message: `Cannot read hour of day from "${timestamp}"` }));
    }
    const factor = hour >= SHIFT_START_HOUR && hour <= SHIFT_END_HOUR ? SHIFT_LOAD_FACTOR : BASE_LOAD_FACTOR;
    return Effect.succeed(capacityKw * factor);
  });
