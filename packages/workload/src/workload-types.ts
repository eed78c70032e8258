import type { PageId } from "@pagesim/core";

export interface ReferenceSource {
  /** Short human-readable description, e.g. for a chart title. */
  readonly label: string;
  /**
   * Produce a reference sequence. Sources with a fixed seed return the same
   * sequence every call.
   */
  generate(): PageId[];
}

/** Memory statistics of one process, as reported by an external inspector. */
export interface ProcessProfile {
  pid: number;
  name: string;
  /** Resident set size in MiB. */
  memoryMb: number;
}

export interface WorkloadOptions {
  /** Number of references to generate. */
  length?: number;
  /** PRNG seed. Defaults to PAGESIM_SEED, then to a random seed. */
  seed?: number;
}

export interface RandomWorkloadOptions extends WorkloadOptions {
  /** Highest page id; pages are drawn from [1, maxPage]. */
  maxPage?: number;
}
