export type {
  DailyAggregate,
  DailyEnergyBalance,
  StorageRecommendation,
  SizingBasis,
} from "./types.js";
export { aggregateDaily, dailyEnergyBalance } from "./daily-aggregation.js";
export { percentile } from "./percentile.js";
export {
  recommendStorage,
  NOISE_FLOOR_KWH,
  SIZING_PERCENTILE,
  USABLE_DEPTH_OF_DISCHARGE,
  STORAGE_DURATION_HOURS,
} from "./storage-advisor.js";
