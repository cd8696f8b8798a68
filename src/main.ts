#!/usr/bin/env node
import { NodeContext, NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Clock, Effect, Logger, LogLevel, Option } from "effect"
import { FileSystem } from "@effect/platform";
import * as Sentry from "@sentry/node";
import { AppConfig } from './config.js';
import { serviceLayers } from './layers.js';
import { InputError } from './errors/input.error.js';
import { reportFailure } from './errors/report-failure.js';
import { Geocoder } from './geocoding/types.js';
import { WeatherProvider, type Coordinates, type HourlyWeatherSample } from './weather/types.js';
import { nextDaysForecast, trailingYearRange } from './weather/date-range.js';
import { estimateCapacity, makeStationConfig, type StationConfig } from './pv-model/index.js';
import { factoryLoadProfile, readLoadFile } from './load/index.js';
import { makeBatteryConfig } from './dispatch/index.js';
import { analyseSite } from './analysis/pipeline.js';
import { ReportLogger } from './report/index.js';

const isProd = process.env.NODE_ENV == 'production';

// Without a DSN the SDK stays disabled
Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const resolveCoordinates = Effect.gen(function* () {
  const address = yield* AppConfig.site.address;

  if (Option.isSome(address)) {
    const geocoder = yield* Geocoder;
    const location = yield* geocoder.locate(address.value);
    yield* Effect.logInfo(`Resolved "${address.value}" to ${location.name}`, {
      latitude: location.latitude,
      longitude: location.longitude,
      timezone: location.timezone,
    });
    return { latitude: location.latitude, longitude: location.longitude } satisfies Coordinates;
  }

  const latitude = yield* AppConfig.site.latitude;
  const longitude = yield* AppConfig.site.longitude;
  if (Option.isNone(latitude) || Option.isNone(longitude)) {
    return yield* new InputError({
      message: 'Set SITE_ADDRESS, or both SITE_LATITUDE and SITE_LONGITUDE',
    });
  }

  return { latitude: latitude.value, longitude: longitude.value } satisfies Coordinates;
});

const resolveStation = Effect.gen(function* () {
  const performanceRatio = yield* AppConfig.station.performanceRatio;
  const capacityKw = yield* AppConfig.station.capacityKw;

  if (Option.isSome(capacityKw)) {
    return yield* makeStationConfig(capacityKw.value, performanceRatio);
  }

  const areaSqm = yield* AppConfig.station.areaSqm;
  if (Option.isNone(areaSqm)) {
    return yield* new InputError({ message: 'Set PV_CAPACITY_KW or PV_AREA_SQM' });
  }

  const installType = yield* AppConfig.station.installType;
  const estimate = yield* estimateCapacity(areaSqm.value, installType);
  yield* Effect.logInfo(
    `Estimated ${estimate.capacityKw.toFixed(2)} kW from ${areaSqm.value} m² at ${estimate.powerDensityWm2} W/m² (${installType})`
  );

  return yield* makeStationConfig(estimate.capacityKw, performanceRatio);
});

const resolveLoad = (weather: readonly HourlyWeatherSample[], station: StationConfig) =>
  Effect.gen(function* () {
    const filePath = yield* AppConfig.load.filePath;
    if (Option.isSome(filePath)) {
      return yield* readLoadFile(filePath.value);
    }

    if (process.argv.includes('--factory-load')) {
      yield* Effect.logWarning('No LOAD_FILE given, using the built-in single-shift factory profile');
      return yield* factoryLoadProfile(weather.map((sample) => sample.timestamp), station.capacityKw);
    }

    return yield* new InputError({ message: 'Set LOAD_FILE, or pass --factory-load to use the built-in profile' });
  });

const program = Effect.gen(function*() {
  const weatherProvider = yield* WeatherProvider;
  const reportLogger = new ReportLogger();

  const coordinates = yield* resolveCoordinates;
  const station = yield* resolveStation;
  const battery = yield* makeBatteryConfig(yield* AppConfig.battery.capacityKwh);

  const request = process.argv.includes('--forecast')
    ? nextDaysForecast()
    : trailingYearRange(new Date(yield* Clock.currentTimeMillis));

  const weather = yield* weatherProvider.fetchHourly(coordinates, request);
  yield* reportLogger.onWeatherLoaded(coordinates, request, weather.length);

  const rawLoadKw = yield* resolveLoad(weather, station);

  const analysis = yield* analyseSite({
    weather,
    station,
    rawLoadKw,
    battery,
    electricityPrice: yield* AppConfig.economics.electricityPrice,
    sizingBasis: process.argv.includes('--size-after-dispatch') ? 'GridExchange' : 'NetLoad',
  });

  yield* reportLogger.onAnalysisComplete(analysis);

  const reportPath = yield* AppConfig.report.filePath;
  if (Option.isSome(reportPath)) {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(reportPath.value, JSON.stringify(analysis, null, 2));
    yield* Effect.logInfo(`Wrote analysis to ${reportPath.value}`);
  }
}).pipe(
  Effect.tapErrorCause((cause) => reportFailure(cause)),
  Effect.ensuring(Effect.promise(() => Sentry.flush(2000))),
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
  Effect.provide(NodeHttpClient.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
