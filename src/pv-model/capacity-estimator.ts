import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";
import type { CapacityEstimate, InstallType } from "./types.js";

// Rules of thumb for crystalline modules:
// ground-mounted rows need ~15-20 m²/kW once spacing is included, flat roofs ~8-10 m²/kW.
const POWER_DENSITY_WM2: Record<InstallType, number> = {
  ground: 60,
  rooftop: 110,
};

export const estimateCapacity = (
  areaSqm: number,
  installType: InstallType
): Effect.Effect<CapacityEstimate, InputError> => {
  if (!Number.isFinite(areaSqm) || areaSqm <= 0) {
    return Effect.fail(new InputError({ message: `Buildable area must be > 0 m², got ${areaSqm}` }));
  }

  const powerDensityWm2 = POWER_DENSITY_WM2[installType];
  return Effect.succeed({
    capacityKw: (areaSqm * powerDensityWm2) / 1000,
    powerDensityWm2,
  });
};
