import type { IReportLogger } from "./types.js";
import type { SiteAnalysis } from "../analysis/pipeline.js";
import type { Coordinates, WeatherRequest } from "../weather/types.js";
import { Effect } from "effect";

const kwh = (value: number) => `${value.toFixed(1)} kWh`;

export class ReportLogger implements IReportLogger {

  public onWeatherLoaded(coordinates: Coordinates, request: WeatherRequest, hours: number) {
    const period = request._tag === "History"
      ? `${request.startDate} to ${request.endDate}`
      : `next ${request.days} days`;
    return Effect.log(`Loaded ${hours} hourly weather samples for ${coordinates.latitude}, ${coordinates.longitude} (${period})`);
  }

  public onAnalysisComplete(analysis: SiteAnalysis) {
    const { load, kpis, recommendation } = analysis;

    return Effect.gen(function* () {
      if (load.strategy === "Tiled") {
        yield* Effect.log(`Load profile of ${load.rawLength} values repeated to fill ${load.values.length} hours`);
        if (load.phaseShifted) {
          yield* Effect.logWarning(
            `Load profile length ${load.rawLength} is not a whole number of days; hour-of-day drifts between repetitions`
          );
        }
      } else if (load.strategy === "Truncated") {
        yield* Effect.log(`Load profile truncated from ${load.rawLength} to ${load.values.length} values`);
      }

      yield* Effect.log(`Generation: ${kwh(kpis.totalGenerationKwh)} (${kpis.equivalentFullLoadHours.toFixed(0)} full-load hours)`);
      yield* Effect.log(`Load: ${kwh(kpis.totalLoadKwh)}`);
      yield* Effect.log(`Self-consumption: ${kwh(kpis.selfConsumedKwh)} (${(kpis.selfConsumptionRate * 100).toFixed(1)}%), estimated savings ${kpis.estimatedSavings.toFixed(1)}`);
      yield* Effect.log(`Grid: import ${kwh(kpis.gridImportKwh)}, export ${kwh(kpis.gridExportKwh)}`);

      switch (recommendation._tag) {
        case "Recommended":
          yield* Effect.log(
            `Recommended storage: ${recommendation.recommendedPowerKw.toFixed(0)} kW / ${recommendation.recommendedEnergyKwh.toFixed(0)} kWh (2-hour system)`,
            { retainedDays: recommendation.retainedDays, consideredDays: recommendation.consideredDays, sizingBasis: analysis.sizingBasis },
          );
          break;
        case "NoStorageWarranted":
          yield* Effect.log(
            `No storage warranted: PV is consumed as it is generated on all ${recommendation.consideredDays} days, or there is no surplus to shift`
          );
          break;
      }
    });
  }
}
