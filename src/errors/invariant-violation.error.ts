import { Data } from "effect";

// Thrown from pure code; inside an Effect it surfaces as a defect.
export class InvariantViolationError extends Data.TaggedError("InvariantViolation")<{
  readonly message: string;
  readonly hour: number;
  readonly stateOfChargeKwh: number;
}> {}
