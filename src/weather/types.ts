import { Context, Data, Effect } from "effect";
import type { InputError } from "../errors/input.error.js";

export type Coordinates = {
  readonly latitude: number; // [-90, 90]
  readonly longitude: number; // [-180, 180]
};

export type HourlyWeatherSample = {
  readonly timestamp: string; // site-local wall clock, "YYYY-MM-DDTHH:mm"
  readonly ambientTemperatureC: number;
  readonly irradianceWm2: number; // global horizontal
};

export type WeatherRequest =
  | { readonly _tag: "History"; readonly startDate: string; readonly endDate: string }
  | { readonly _tag: "Forecast"; readonly days: number };

export class WeatherDataUnavailableError extends Data.TaggedError(
  "WeatherDataUnavailable"
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class WeatherProvider extends Context.Tag("WeatherProvider")<
  WeatherProvider,
  {
    readonly fetchHourly: (
      coordinates: Coordinates,
      request: WeatherRequest
    ) => Effect.Effect<
      readonly HourlyWeatherSample[],
      WeatherDataUnavailableError | InputError
    >;
  }
>() {}

export type IWeatherProvider = Context.Tag.Service<typeof WeatherProvider>;
