import { Layer } from "effect";
import { OpenMeteoWeatherLayer } from "./weather/open-meteo.adapter.js";
import { OpenMeteoGeocoderFromConfigLayer } from "./geocoding/open-meteo-geocoding.adapter.js";

export const serviceLayers = Layer.mergeAll(
    OpenMeteoWeatherLayer,
    OpenMeteoGeocoderFromConfigLayer,
);
