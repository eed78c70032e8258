import { PagingPolicy } from "./paging-policy.js";
import type { PageId } from "./types.js";

/**
 * Optimal (Belady): evict the resident page whose next reference is farthest
 * in the future, or that never recurs. Ties go to the lowest frame index.
 */
export class OptimalPolicy extends PagingPolicy {
  readonly name = "optimal";

  protected selectVictimSlot(sequence: readonly PageId[], index: number): number {
    let victimSlot = 0;
    let farthest = -1;

    this.table.snapshot().forEach((page, slot) => {
      const distance = nextUse(sequence, page, index + 1);
      // Strict comparison keeps the earliest frame on a tie.
      if (distance > farthest) {
        farthest = distance;
        victimSlot = slot;
      }
    });

    return victimSlot;
  }
}

/**
 * Index of the first reference to `page` at or after `from`, or
 * `Number.POSITIVE_INFINITY` if it never recurs.
 */
export function nextUse(
  sequence: readonly PageId[],
  page: PageId,
  from: number
): number {
  for (let j = from; j < sequence.length; j++) {
    if (sequence[j] === page) return j;
  }
  return Number.POSITIVE_INFINITY;
}
