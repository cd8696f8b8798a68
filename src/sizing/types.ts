export type DailyAggregate = {
  readonly date: string; // site-local calendar day, YYYY-MM-DD
  readonly surplusKwh: number; // |sum| of hours with net load < 0
  readonly deficitKwh: number; // sum of hours with net load > 0
  readonly effectiveStorageKwh: number; // min(surplus, deficit): shiftable within the same day
};

export type DailyEnergyBalance = {
  readonly date: string;
  readonly generationKwh: number;
  readonly loadKwh: number;
};

export type StorageRecommendation =
  | {
      readonly _tag: "Recommended";
      readonly recommendedPowerKw: number;
      readonly recommendedEnergyKwh: number;
      readonly sizingPercentileKwh: number; // P90 of retained effective storage, before DoD inflation
      readonly retainedDays: number;
      readonly consideredDays: number;
    }
  | {
      readonly _tag: "NoStorageWarranted";
      readonly consideredDays: number;
    };

export type SizingBasis = "NetLoad" | "GridExchange";
