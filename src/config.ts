import { Config as EffectConfig } from "effect";


export const AppConfig = {
  site: {
    latitude: EffectConfig.option(
      EffectConfig.number("SITE_LATITUDE").pipe(
        EffectConfig.validate({
          message: "SITE_LATITUDE must be within [-90, 90]",
          validation: (value) => value >= -90 && value <= 90,
        })
      )
    ),
    longitude: EffectConfig.option(
      EffectConfig.number("SITE_LONGITUDE").pipe(
        EffectConfig.validate({
          message: "SITE_LONGITUDE must be within [-180, 180]",
          validation: (value) => value >= -180 && value <= 180,
        })
      )
    ),
    address: EffectConfig.option(EffectConfig.string("SITE_ADDRESS")),
  },

  station: {
    capacityKw: EffectConfig.option(EffectConfig.number("PV_CAPACITY_KW")),
    areaSqm: EffectConfig.option(EffectConfig.number("PV_AREA_SQM")),
    installType: EffectConfig.literal("ground", "rooftop")("PV_INSTALL_TYPE").pipe(
      EffectConfig.withDefault("ground" as const)
    ),
    performanceRatio: EffectConfig.number("PV_PERFORMANCE_RATIO").pipe(
      EffectConfig.withDefault(0.82)
    ),
  },

  battery: {
    capacityKwh: EffectConfig.number("BATTERY_CAPACITY_KWH").pipe(
      EffectConfig.withDefault(0)
    ),
  },

  load: {
    filePath: EffectConfig.option(EffectConfig.string("LOAD_FILE")),
  },

  report: {
    filePath: EffectConfig.option(EffectConfig.string("REPORT_FILE")),
  },

  economics: {
    electricityPrice: EffectConfig.number("ELECTRICITY_PRICE").pipe(
      EffectConfig.withDefault(0.8)
    ),
  },

  openMeteo: {
    forecastUrl: EffectConfig.string("OPEN_METEO_FORECAST_URL").pipe(
      EffectConfig.withDefault("https://api.open-meteo.com/v1/forecast")
    ),
    archiveUrl: EffectConfig.string("OPEN_METEO_ARCHIVE_URL").pipe(
      EffectConfig.withDefault("https://archive-api.open-meteo.com/v1/archive")
    ),
    geocodingUrl: EffectConfig.string("OPEN_METEO_GEOCODING_URL").pipe(
      EffectConfig.withDefault("https://geocoding-api.open-meteo.com/v1/search")
    ),
  },
};
