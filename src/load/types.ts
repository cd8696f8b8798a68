export type AlignmentStrategy = "Exact" | "Truncated" | "Tiled";

export type AlignedLoad = {
  readonly values: readonly number[]; // kW, one per target hour
  readonly rawLength: number;
  readonly strategy: AlignmentStrategy;
  // Tiling a profile whose length is not a whole number of days drifts hour-of-day across tiles.
  readonly phaseShifted: boolean;
};
