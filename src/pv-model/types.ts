export type StationConfig = {
  readonly capacityKw: number; // DC nameplate, > 0
  readonly performanceRatio: number; // system losses, 0 < PR < 1
  readonly temperatureCoefficient: number; // per °C, crystalline silicon ~ -0.004
  readonly cellTempOffsetCoefficient: number; // °C rise per W/m² of irradiance
};

export type InstallType = "ground" | "rooftop";

export type CapacityEstimate = {
  readonly capacityKw: number;
  readonly powerDensityWm2: number;
};
