import type { PageId } from "../src/types.js";

/** The textbook reference string used across the policy tests. */
export const BELADY_SEQUENCE: PageId[] = [1, 2, 3, 4, 1, 2, 5, 1, 2, 3, 4, 5];

/**
 * Deterministic pseudo-random sequences (Park-Miller) for property checks.
 * `seed` must be non-zero.
 */
export function pseudoRandomSequence(
  seed: number,
  length: number,
  maxPage: number
): PageId[] {
  let state = seed;
  const result: PageId[] = [];
  for (let i = 0; i < length; i++) {
    state = (state * 48271) % 2147483647;
    result.push(state % (maxPage + 1));
  }
  return result;
}
