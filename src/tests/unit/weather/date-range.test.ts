import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  nextDaysForecast,
  trailingYearRange,
  validateRequest,
} from "../../../weather/date-range.js";

describe("date-range", () => {
  it("should cover the 365 days ending yesterday", () => {
    expect(trailingYearRange(new Date("2024-06-15T10:00:00Z"))).toEqual({
      _tag: "History",
      startDate: "2023-06-15",
      endDate: "2024-06-14",
    });
  });

  it("should default the forecast to the next 7 days", () => {
    expect(nextDaysForecast()).toEqual({ _tag: "Forecast", days: 7 });
  });

  it.effect("should reject a reversed date range", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        validateRequest({ _tag: "History", startDate: "2024-02-01", endDate: "2024-01-01" })
      );

      expect(error.message).toBe("Start date 2024-02-01 is after end date 2024-01-01");
    })
  );

  it.effect("should reject dates that are not YYYY-MM-DD", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        validateRequest({ _tag: "History", startDate: "2024/01/01", endDate: "2024-01-02" })
      );

      expect(error.message).toBe("Dates must be YYYY-MM-DD, got 2024/01/01..2024-01-02");
    })
  );
});
