import { parseSimulationConfig } from "./config.js";
import { logger } from "./logger.js";
import { LruPolicy } from "./lru-policy.js";
import { OptimalPolicy } from "./optimal-policy.js";
import type {
  PageId,
  PolicyComparison,
  ReplacementPolicy,
  SimulationConfig,
  SimulationResult,
} from "./types.js";

export function createPolicy(config: SimulationConfig): ReplacementPolicy {
  const { frameCount, policy } = parseSimulationConfig(config);
  switch (policy) {
    case "lru":
      return new LruPolicy(frameCount);
    case "optimal":
      return new OptimalPolicy(frameCount);
  }
}

/**
 * Run one policy over a reference sequence. Each call builds a fresh policy,
 * so nothing is retained between runs.
 */
export function simulate(
  config: SimulationConfig,
  sequence: readonly PageId[]
): SimulationResult {
  const result = createPolicy(config).simulate(sequence);
  logger.debug(
    {
      policy: result.policy,
      frameCount: result.frameCount,
      references: sequence.length,
      faults: result.faultCount,
    },
    "simulation finished"
  );
  return result;
}

/** Run LRU and Optimal over the same input. */
export function compare(
  frameCount: number,
  sequence: readonly PageId[]
): PolicyComparison {
  const lru = simulate({ frameCount, policy: "lru" }, sequence);
  const optimal = simulate({ frameCount, policy: "optimal" }, sequence);
  return {
    lru,
    optimal,
    difference: lru.faultCount - optimal.faultCount,
  };
}
