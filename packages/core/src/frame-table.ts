import { InvalidFrameCountError } from "./errors.js";
import type { FrameState, PageId } from "./types.js";

/** Sentinel stored in a frame that holds no page. */
export const EMPTY_FRAME = -1;

/**
 * The fixed set of physical frames. Tracks what is where; choosing what to
 * evict belongs to the policies.
 */
export class FrameTable {
  readonly size: number;
  private readonly slots: PageId[];

  constructor(size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidFrameCountError(size);
    }
    this.size = size;
    this.slots = new Array<PageId>(size).fill(EMPTY_FRAME);
  }

  isResident(page: PageId): boolean {
    return this.slots.includes(page);
  }

  /** Lowest-index empty slot, or null when every frame is occupied. */
  firstEmptySlot(): number | null {
    return this.slotOf(EMPTY_FRAME);
  }

  slotOf(page: PageId): number | null {
    const index = this.slots.indexOf(page);
    return index === -1 ? null : index;
  }

  assign(index: number, page: PageId): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(
        `Frame index ${index} is out of range [0, ${this.size})`
      );
    }
    this.slots[index] = page;
  }

  /** A copy of the current contents; later mutation does not affect it. */
  snapshot(): PageId[] {
    return [...this.slots];
  }

  /** Number of non-empty frames. */
  occupied(): number {
    return this.slots.filter((page) => page !== EMPTY_FRAME).length;
  }

  clear(): void {
    this.slots.fill(EMPTY_FRAME);
  }
}

export function emptyFrameState(size: number): FrameState {
  return new Array<PageId>(size).fill(EMPTY_FRAME);
}
