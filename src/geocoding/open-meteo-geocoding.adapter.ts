import { Duration, Effect, Layer, Schema } from "effect";
import { HttpClient } from "@effect/platform";
import { AppConfig } from "../config.js";
import {
  Geocoder,
  GeocodingUnavailableError,
  LocationNotFoundError,
  type GeocodedLocation,
} from "./types.js";

const GeocodingResultSchema = Schema.Struct({
  name: Schema.String,
  latitude: Schema.Number,
  longitude: Schema.Number,
  country: Schema.optional(Schema.String),
  timezone: Schema.optional(Schema.String),
});

// "results" is omitted entirely when nothing matches
const GeocodingResponseSchema = Schema.Struct({
  results: Schema.optional(Schema.Array(GeocodingResultSchema)),
});

export type GeocodingConfig = {
  readonly searchUrl: string;
};

const TIMEOUT = Duration.seconds(10);

export const OpenMeteoGeocoderLayer = (
  config: GeocodingConfig
): Layer.Layer<Geocoder, never, HttpClient.HttpClient> =>
  Layer.effect(
    Geocoder,
    Effect.gen(function* () {
      const httpClient = yield* HttpClient.HttpClient;

      const locate = (
        address: string
      ): Effect.Effect<GeocodedLocation, LocationNotFoundError | GeocodingUnavailableError> =>
        Effect.gen(function* () {
          const name = address.trim();
          if (name.length === 0) {
            return yield* new LocationNotFoundError({ address });
          }

          const url = new URL(config.searchUrl);
          url.searchParams.set("name", name);
          url.searchParams.set("count", "1");
          url.searchParams.set("format", "json");

          const response = yield* httpClient.get(url.toString());
          const responseText = yield* response.text;

          if (response.status !== 200) {
            return yield* new GeocodingUnavailableError({
              message: `Geocoding API returned status ${response.status}. Body: ${responseText}`,
            });
          }

          const parsed = yield* Schema.decodeUnknown(Schema.parseJson(GeocodingResponseSchema))(
            responseText
          );

          const [first] = parsed.results ?? [];
          if (!first) {
            return yield* new LocationNotFoundError({ address });
          }

          yield* Effect.logDebug(`Geocoded "${name}" to ${first.latitude}, ${first.longitude}`);

          return first;
        }).pipe(
          Effect.timeout(TIMEOUT),
          Effect.catchTags({
            TimeoutException: () =>
              Effect.fail(new GeocodingUnavailableError({ message: "Geocoding request timed out" })),
            RequestError: (err) =>
              Effect.fail(
                new GeocodingUnavailableError({
                  message: `Geocoding request failed: ${err.message}`,
                  cause: err,
                })
              ),
            ResponseError: (err) =>
              Effect.fail(
                new GeocodingUnavailableError({
                  message: `Geocoding response could not be read: ${err.message}`,
                  cause: err,
                })
              ),
            ParseError: (err) =>
              Effect.fail(
                new GeocodingUnavailableError({
                  message: "Unrecognized response from geocoding API",
                  cause: err,
                })
              ),
          })
        );

      return Geocoder.of({ locate });
    })
  );

export const OpenMeteoGeocoderFromConfigLayer = Layer.unwrapEffect(
  Effect.map(AppConfig.openMeteo.geocodingUrl, (searchUrl) =>
    OpenMeteoGeocoderLayer({ searchUrl })
  )
);
