export type { BatteryConfig, DispatchResult } from "./types.js";
export {
  makeBatteryConfig,
  computeNetLoad,
  simulateDispatch,
  DEFAULT_MAX_C_RATE,
  DEFAULT_INITIAL_SOC_FRACTION,
} from "./simulate-dispatch.js";
