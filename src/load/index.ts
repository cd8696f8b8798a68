export type { AlignedLoad, AlignmentStrategy } from "./types.js";
export { alignLoadSeries } from "./align.js";
export { parseLoadCsv } from "./csv.js";
export { readLoadFile } from "./load-file.js";
export { factoryLoadProfile } from "./factory-profile.js";
