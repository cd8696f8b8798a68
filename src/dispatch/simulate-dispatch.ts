import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import { InvariantViolationError } from "../errors/invariant-violation.error.js";
import type { BatteryConfig, DispatchResult } from "./types.js";

export const DEFAULT_MAX_C_RATE = 0.5;
export const DEFAULT_INITIAL_SOC_FRACTION = 0.5;

export const makeBatteryConfig = (
  energyCapacityKwh: number
): Effect.Effect<BatteryConfig, InputError> =>
  Number.isFinite(energyCapacityKwh) && energyCapacityKwh >= 0
    ? Effect.succeed({
        energyCapacityKwh,
        maxCRate: DEFAULT_MAX_C_RATE,
        initialSocFraction: DEFAULT_INITIAL_SOC_FRACTION,
      })
    : Effect.fail(
        new InputError({ message: `Battery capacity must be >= 0 kWh, got ${energyCapacityKwh}` })
      );

export const computeNetLoad = (
  loadKw: readonly number[],
  generationKw: readonly number[]
): Effect.Effect<readonly number[], InputError> => {
  if (loadKw.length !== generationKw.length) {
    return Effect.fail(
      new InputError({
        message: `Load (${loadKw.length}) and generation (${generationKw.length}) series differ in length`,
      })
    );
  }
  return Effect.succeed(loadKw.map((load, i) => load - generationKw[i]));
};

// Greedy hourly dispatch: charge from every surplus, discharge into every deficit,
// limited by headroom, stored energy and the C-rate. Strictly sequential.
export const simulateDispatch = (
  netLoadKw: readonly number[],
  battery: BatteryConfig
): DispatchResult => {
  const hours = netLoadKw.length;
  const capacity = battery.energyCapacityKwh;

  if (capacity === 0) {
    return {
      netLoadKw,
      batteryPowerKw: new Array<number>(hours).fill(0),
      stateOfChargeKwh: new Array<number>(hours).fill(0),
      gridPowerKw: netLoadKw.slice(),
    };
  }

  const maxPowerKw = battery.maxCRate * capacity;
  const batteryPowerKw: number[] = [];
  const stateOfChargeKwh: number[] = [];
  let soc = battery.initialSocFraction * capacity;

  for (let i = 0; i < hours; i++) {
    const net = netLoadKw[i];
    let power = 0;

    if (net < 0) {
      const headroom = capacity - soc;
      const charge = Math.min(Math.abs(net), headroom, maxPowerKw);
      // min() keeps float rounding from stepping past the bound
      soc = Math.min(capacity, soc + charge);
      power = charge > 0 ? -charge : 0;
    } else if (net > 0) {
      const discharge = Math.min(net, soc, maxPowerKw);
      soc = Math.max(0, soc - discharge);
      power = discharge;
    }

    if (!(soc >= 0 && soc <= capacity)) {
      throw new InvariantViolationError({
        message: `State of charge left [0, ${capacity}] kWh`,
        hour: i,
        stateOfChargeKwh: soc,
      });
    }

    batteryPowerKw.push(power);
    stateOfChargeKwh.push(soc);
  }

  return {
    netLoadKw,
    batteryPowerKw,
    stateOfChargeKwh,
    gridPowerKw: netLoadKw.map((net, i) => net - batteryPowerKw[i]),
  };
};
