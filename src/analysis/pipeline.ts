import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { HourlyWeatherSample } from "../weather/types.js";
import { simulateGeneration, type StationConfig } from "../pv-model/index.js";
import { alignLoadSeries, type AlignedLoad } from "../load/index.js";
import {
  computeNetLoad,
  simulateDispatch,
  type BatteryConfig,
  type DispatchResult,
} from "../dispatch/index.js";
import {
  aggregateDaily,
  dailyEnergyBalance,
  recommendStorage,
  type DailyAggregate,
  type DailyEnergyBalance,
  type SizingBasis,
  type StorageRecommendation,
} from "../sizing/index.js";
import { summarize, type SiteKpis } from "./kpis.js";

export type SiteAnalysisInput = {
  readonly weather: readonly HourlyWeatherSample[];
  readonly station: StationConfig;
  readonly rawLoadKw: readonly number[];
  readonly battery: BatteryConfig;
  readonly electricityPrice: number;
  // NetLoad sizes storage from scratch; GridExchange sizes what is left after the configured battery.
  readonly sizingBasis: SizingBasis;
};

export type SiteAnalysis = {
  readonly timestamps: readonly string[];
  readonly generationKw: readonly number[];
  readonly load: AlignedLoad;
  readonly dispatch: DispatchResult;
  readonly sizingBasis: SizingBasis;
  readonly daily: readonly DailyAggregate[];
  readonly dailyBalance: readonly DailyEnergyBalance[];
  readonly recommendation: StorageRecommendation;
  readonly kpis: SiteKpis;
};

// Weather -> PV -> load alignment -> dispatch -> daily aggregation -> recommendation.
// Every stage is a pure transform of the previous stage's output.
export const analyseSite = (
  input: SiteAnalysisInput
): Effect.Effect<SiteAnalysis, InputError> =>
  Effect.gen(function* () {
    const { weather, station, rawLoadKw, battery, electricityPrice, sizingBasis } = input;

    if (weather.length === 0) {
      return yield* new InputError({ message: "No weather samples to simulate against" });
    }

    const timestamps = weather.map((sample) => sample.timestamp);
    const generationKw = simulateGeneration(weather, station);
    const load = yield* alignLoadSeries(rawLoadKw, weather.length);
    const netLoadKw = yield* computeNetLoad(load.values, generationKw);

    // simulateDispatch throws only on a broken invariant, which surfaces as a defect
    const dispatch = yield* Effect.sync(() => simulateDispatch(netLoadKw, battery));

    const daily = yield* aggregateDaily(
      timestamps,
      sizingBasis === "NetLoad" ? dispatch.netLoadKw : dispatch.gridPowerKw
    );
    const dailyBalance = yield* dailyEnergyBalance(timestamps, generationKw, load.values);
    const recommendation = yield* recommendStorage(daily);

    const kpis = summarize({
      capacityKw: station.capacityKw,
      generationKw,
      loadKw: load.values,
      dispatch,
      electricityPrice,
    });

    return {
      timestamps,
      generationKw,
      load,
      dispatch,
      sizingBasis,
      daily,
      dailyBalance,
      recommendation,
      kpis,
    };
  });
