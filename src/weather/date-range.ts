import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { Coordinates, WeatherRequest } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

// The 365 days ending yesterday (UTC calendar), matching what the archive API can serve.
export const trailingYearRange = (today: Date): WeatherRequest => {
  const end = new Date(today.getTime() - DAY_MS);
  const start = new Date(end.getTime() - 365 * DAY_MS);
  return {
    _tag: "History",
    startDate: formatDate(start),
    endDate: formatDate(end),
  };
};

export const nextDaysForecast = (days = 7): WeatherRequest => ({
  _tag: "Forecast",
  days,
});

export const validateRequest = (
  request: WeatherRequest
): Effect.Effect<WeatherRequest, InputError> => {
  switch (request._tag) {
    case "History":
      if (!ISO_DATE.test(request.startDate) || !ISO_DATE.test(request.endDate)) {
        return Effect.fail(
          new InputError({
            message: `Dates must be YYYY-MM-DD, got ${request.startDate}..${request.endDate}`,
          })
        );
      }
      // ISO dates compare lexicographically
      if (request.startDate > request.endDate) {
        return Effect.fail(
          new InputError({
            message: `Start date ${request.startDate} is after end date ${request.endDate}`,
          })
        );
      }
      return Effect.succeed(request);

    case "Forecast":
      if (!Number.isInteger(request.days) || request.days < 1 || request.days > 16) {
        return Effect.fail(
          new InputError({ message: `Forecast days must be an integer in [1, 16], got ${request.days}` })
        );
      }
      return Effect.succeed(request);
  }
};

export const validateCoordinates = (
  coordinates: Coordinates
): Effect.Effect<Coordinates, InputError> => {
  const { latitude, longitude } = coordinates;
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    return Effect.fail(new InputError({ message: `Latitude ${latitude} is outside [-90, 90]` }));
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    return Effect.fail(new InputError({ message: `Longitude ${longitude} is outside [-180, 180]` }));
  }
  return Effect.succeed(coordinates);
};
