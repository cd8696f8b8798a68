export type BatteryConfig = {
  readonly energyCapacityKwh: number; // 0 disables dispatch
  readonly maxCRate: number; // max charge/discharge power as a fraction of capacity per hour
  readonly initialSocFraction: number;
};

export type DispatchResult = {
  readonly netLoadKw: readonly number[]; // load - generation; negative = surplus
  readonly batteryPowerKw: readonly number[]; // positive = discharging, negative = charging
  readonly stateOfChargeKwh: readonly number[]; // at the end of each hour
  readonly gridPowerKw: readonly number[]; // positive = import, negative = export
};
