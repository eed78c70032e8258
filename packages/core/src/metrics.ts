import type { SimulationResult, SimulationSummary } from "./types.js";

export function summarize(result: SimulationResult): SimulationSummary {
  const references = result.history.length;
  const faults = result.faultCount;
  const hits = references - faults;

  if (references === 0) {
    return { references, faults, hits, faultRate: null, hitRate: null };
  }
  return {
    references,
    faults,
    hits,
    faultRate: faults / references,
    hitRate: hits / references,
  };
}

/** Render a rate as a percentage with two decimals, e.g. "75.00%". */
export function formatPercent(rate: number | null): string {
  if (rate === null) return "n/a";
  return `${(rate * 100).toFixed(2)}%`;
}
