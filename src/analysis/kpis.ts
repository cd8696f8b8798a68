import type { DispatchResult } from "../dispatch/types.js";

export type SiteKpis = {
  readonly totalGenerationKwh: number;
  readonly totalLoadKwh: number;
  readonly equivalentFullLoadHours: number; // generation per kW installed
  readonly selfConsumedKwh: number;
  readonly selfConsumptionRate: number; // 0..1 of generation
  readonly estimatedSavings: number; // self-consumed energy at the electricity price
  readonly gridImportKwh: number;
  readonly gridExportKwh: number;
};

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

export const summarize = (params: {
  readonly capacityKw: number;
  readonly generationKw: readonly number[];
  readonly loadKw: readonly number[];
  readonly dispatch: DispatchResult;
  readonly electricityPrice: number;
}): SiteKpis => {
  const { capacityKw, generationKw, loadKw, dispatch, electricityPrice } = params;

  const totalGenerationKwh = sum(generationKw);
  const surplusKwh = sum(dispatch.netLoadKw.filter((net) => net < 0).map((net) => -net));
  const chargedKwh = sum(dispatch.batteryPowerKw.filter((power) => power < 0).map((power) => -power));

  // Surplus not absorbed by the battery is exported
  const selfConsumedKwh = totalGenerationKwh - surplusKwh + chargedKwh;

  return {
    totalGenerationKwh,
    totalLoadKwh: sum(loadKw),
    equivalentFullLoadHours: capacityKw > 0 ? totalGenerationKwh / capacityKw : 0,
    selfConsumedKwh,
    selfConsumptionRate: totalGenerationKwh > 0 ? selfConsumedKwh / totalGenerationKwh : 0,
    estimatedSavings: selfConsumedKwh * electricityPrice,
    gridImportKwh: sum(dispatch.gridPowerKw.filter((grid) => grid > 0)),
    gridExportKwh: sum(dispatch.gridPowerKw.filter((grid) => grid < 0).map((grid) => -grid)),
  };
};
