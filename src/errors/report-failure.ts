import { Cause, Effect } from "effect";
import * as Sentry from "@sentry/node";

// Interruption (Ctrl-C, shutdown) is not a failure and is never reported.
export const reportFailure = (
  cause: Cause.Cause<unknown>,
  capture: (error: unknown) => void = (error) => {
    Sentry.captureException(error);
  }
): Effect.Effect<void> =>
  Cause.isInterruptedOnly(cause)
    ? Effect.void
    : Effect.sync(() => capture(Cause.squash(cause)));
