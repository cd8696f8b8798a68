import type { Effect } from "effect";
import type { SiteAnalysis } from "../analysis/pipeline.js";
import type { Coordinates, WeatherRequest } from "../weather/types.js";

export type IReportLogger = {
  onWeatherLoaded: (coordinates: Coordinates, request: WeatherRequest, hours: number) => Effect.Effect<void>;
  onAnalysisComplete: (analysis: SiteAnalysis) => Effect.Effect<void>;
};
