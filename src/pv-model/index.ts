export type { StationConfig, InstallType, CapacityEstimate } from "./types.js";
export {
  makeStationConfig,
  cellTemperature,
  temperatureCorrection,
  generationKw,
  simulateGeneration,
  DEFAULT_TEMPERATURE_COEFFICIENT,
  DEFAULT_CELL_TEMP_OFFSET_COEFFICIENT,
} from "./generation.js";
export { estimateCapacity } from "./capacity-estimator.js";
