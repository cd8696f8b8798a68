import { Duration, Effect, Layer, Schedule, Schema } from "effect";
import { HttpClient } from "@effect/platform";
import { AppConfig } from "../config.js";
import type { InputError } from "../errors/input.error.js";
import { validateCoordinates, validateRequest } from "./date-range.js";
import {
  WeatherDataUnavailableError,
  WeatherProvider,
  type Coordinates,
  type HourlyWeatherSample,
  type IWeatherProvider,
  type WeatherRequest,
} from "./types.js";

export type OpenMeteoConfig = {
  readonly forecastUrl: string;
  readonly archiveUrl: string;
};

// ============================================================================
// API Response Schema
// ============================================================================

// Archive responses carry nulls for hours not yet published.
const HourlySchema = Schema.Struct({
  time: Schema.Array(Schema.String),
  temperature_2m: Schema.Array(Schema.NullOr(Schema.Number)),
  shortwave_radiation: Schema.Array(Schema.NullOr(Schema.Number)),
});

const OpenMeteoResponseSchema = Schema.Struct({
  timezone: Schema.optional(Schema.String),
  hourly: Schema.optional(HourlySchema),
});

export type OpenMeteoHourly = Schema.Schema.Type<typeof HourlySchema>;

const HOURLY_VARIABLES = "temperature_2m,shortwave_radiation";

const defaultRetrySchedule: Schedule.Schedule<unknown, unknown> = Schedule.compose(
  Schedule.recurs(3),
  Schedule.exponential(Duration.seconds(1), 2) // 1s, 2s, 4s
);

export const buildRequestUrl = (
  config: OpenMeteoConfig,
  coordinates: Coordinates,
  request: WeatherRequest
): URL => {
  const url = new URL(request._tag === "History" ? config.archiveUrl : config.forecastUrl);
  url.searchParams.set("latitude", coordinates.latitude.toString());
  url.searchParams.set("longitude", coordinates.longitude.toString());
  url.searchParams.set("hourly", HOURLY_VARIABLES);
  url.searchParams.set("timezone", "auto");

  if (request._tag === "History") {
    url.searchParams.set("start_date", request.startDate);
    url.searchParams.set("end_date", request.endDate);
  } else {
    url.searchParams.set("forecast_days", request.days.toString());
  }

  return url;
};

export const toSamples = (
  hourly: OpenMeteoHourly
): Effect.Effect<readonly HourlyWeatherSample[], WeatherDataUnavailableError> => {
  const { time, temperature_2m: temperature, shortwave_radiation: irradiance } = hourly;

  if (temperature.length !== time.length || irradiance.length !== time.length) {
    return Effect.fail(
      new WeatherDataUnavailableError({
        message: `Hourly arrays differ in length (time=${time.length}, temperature=${temperature.length}, irradiance=${irradiance.length})`,
      })
    );
  }

  let end = time.length;
  while (end > 0 && (temperature[end - 1] === null || irradiance[end - 1] === null)) {
    end--;
  }

  if (end === 0) {
    return Effect.fail(
      new WeatherDataUnavailableError({ message: "Open-Meteo returned no hourly samples" })
    );
  }

  const samples: HourlyWeatherSample[] = [];
  for (let i = 0; i < end; i++) {
    const ambientTemperatureC = temperature[i];
    const irradianceWm2 = irradiance[i];
    if (ambientTemperatureC === null || irradianceWm2 === null) {
      return Effect.fail(
        new WeatherDataUnavailableError({ message: `Hourly series has a gap at ${time[i]}` })
      );
    }
    samples.push({ timestamp: time[i], ambientTemperatureC, irradianceWm2 });
  }

  return Effect.succeed(samples);
};

export class OpenMeteoWeatherAdapter implements IWeatherProvider {
  private readonly TIMEOUT_MS = 10_000;

  constructor(
    private config: OpenMeteoConfig,
    private httpClient: HttpClient.HttpClient,
    private retrySchedule: Schedule.Schedule<unknown, unknown> = defaultRetrySchedule,
  ) { }

  public fetchHourly(
    coordinates: Coordinates,
    request: WeatherRequest
  ): Effect.Effect<readonly HourlyWeatherSample[], WeatherDataUnavailableError | InputError> {
    const config = this.config;
    const httpClient = this.httpClient;
    const retrySchedule = this.retrySchedule;
    const timeoutMs = this.TIMEOUT_MS;

    return Effect.gen(function* () {
      yield* validateCoordinates(coordinates);
      yield* validateRequest(request);

      const url = buildRequestUrl(config, coordinates, request);

      return yield* Effect.gen(function* () {
        const response = yield* httpClient.get(url.toString(), {
          headers: { Accept: "application/json" },
        });
        const responseText = yield* response.text;

        if (response.status !== 200) {
          return yield* new WeatherDataUnavailableError({
            message: `Open-Meteo returned status ${response.status}. Body: ${responseText}`,
          });
        }

        const parsed = yield* Schema.decodeUnknown(Schema.parseJson(OpenMeteoResponseSchema))(
          responseText
        );

        if (!parsed.hourly) {
          return yield* new WeatherDataUnavailableError({
            message: "Open-Meteo response has no hourly data",
          });
        }

        const samples = yield* toSamples(parsed.hourly);

        yield* Effect.logDebug(`Fetched ${samples.length} hourly weather samples`, {
          request: request._tag,
          timezone: parsed.timezone,
        });

        return samples;
      }).pipe(
        Effect.timeout(Duration.millis(timeoutMs)),
        Effect.retry({
          schedule: retrySchedule,
          while: (err) =>
            err._tag === "TimeoutException" ||
            (err._tag === "RequestError" && err.reason === "Transport"),
        }),
        Effect.catchTags({
          TimeoutException: () =>
            Effect.fail(new WeatherDataUnavailableError({ message: "Open-Meteo request timed out" })),
          RequestError: (err) =>
            Effect.fail(
              new WeatherDataUnavailableError({
                message: `Open-Meteo request failed: ${err.message}`,
                cause: err,
              })
            ),
          ResponseError: (err) =>
            Effect.fail(
              new WeatherDataUnavailableError({
                message: `Open-Meteo response could not be read: ${err.message}`,
                cause: err,
              })
            ),
          ParseError: (err) =>
            Effect.fail(
              new WeatherDataUnavailableError({
                message: "Unrecognized response from Open-Meteo",
                cause: err,
              })
            ),
        })
      );
    });
  }
}

export const OpenMeteoWeatherLayer = Layer.effect(
  WeatherProvider,
  Effect.gen(function* () {
    const config = AppConfig.openMeteo;

    return new OpenMeteoWeatherAdapter(
      {
        forecastUrl: yield* config.forecastUrl,
        archiveUrl: yield* config.archiveUrl,
      },
      yield* HttpClient.HttpClient
    );
  })
);
