import { z } from "zod";
import {
  InvalidFrameCountError,
  InvalidPageError,
  UnknownPolicyError,
} from "./errors.js";
import type { PageId, SimulationConfig } from "./types.js";

export const policyNameSchema = z.enum(["lru", "optimal"]);

export const simulationConfigSchema = z.object({
  frameCount: z.number().int().positive(),
  policy: policyNameSchema,
});

export const referenceSequenceSchema = z.array(
  z.number().int().nonnegative().safe()
);

/**
 * Validate a simulation config. The frame count is checked first, so a config
 * that is wrong in both fields reports the frame count.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const raw: object = typeof input === "object" && input !== null ? input : {};
  const field = parsed.error.issues[0]?.path[0];
  if (field === "policy") {
    throw new UnknownPolicyError("policy" in raw ? raw.policy : undefined);
  }
  throw new InvalidFrameCountError(
    "frameCount" in raw ? raw.frameCount : undefined
  );
}

/** Reject the whole sequence on its first reference that is not a page id. */
export function validateReferenceSequence(
  sequence: readonly unknown[]
): PageId[] {
  const parsed = referenceSequenceSchema.safeParse(sequence);
  if (parsed.success) {
    return parsed.data;
  }

  const position = parsed.error.issues[0]?.path[0];
  const index = typeof position === "number" ? position : 0;
  throw new InvalidPageError(sequence[index], index);
}
