export type {
  ReferenceSource,
  ProcessProfile,
  WorkloadOptions,
  RandomWorkloadOptions,
} from "./workload-types.js";
export type { Random } from "./random.js";

export { parseReferenceString, formatReferenceString } from "./reference-string.js";
export { createRandom, randomSeed } from "./random.js";
export { ProcessWorkload } from "./process-workload.js";
export { RandomWorkload } from "./random-workload.js";
export { EXAMPLE_SEQUENCES, getExampleSequence } from "./examples.js";
