import { Context, Data, Effect } from "effect";
import type { Coordinates } from "../weather/types.js";

export type GeocodedLocation = Coordinates & {
  readonly name: string;
  readonly country?: string;
  readonly timezone?: string;
};

export class LocationNotFoundError extends Data.TaggedError("LocationNotFound")<{
  readonly address: string;
}> {
  public override readonly message = `No location found for "${this.address}"`;
}

export class GeocodingUnavailableError extends Data.TaggedError("GeocodingUnavailable")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class Geocoder extends Context.Tag("Geocoder")<
  Geocoder,
  {
    readonly locate: (
      address: string
    ) => Effect.Effect<GeocodedLocation, LocationNotFoundError | GeocodingUnavailableError>;
  }
>() {}
