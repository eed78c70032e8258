import { PagingPolicy } from "./paging-policy.js";
import { RecencyList } from "./recency-list.js";
import type { PageId } from "./types.js";

/** Least-Recently-Used: evict the resident page referenced longest ago. */
export class LruPolicy extends PagingPolicy {
  readonly name = "lru";

  // Holds exactly the resident pages.
  private readonly recency = new RecencyList<PageId>();

  /** Resident pages from least to most recently used. */
  recencyOrder(): PageId[] {
    return this.recency.keys();
  }

  protected reset(): void {
    super.reset();
    this.recency.clear();
  }

  protected selectVictimSlot(): number {
    const victim = this.recency.oldest();
    const slot = victim === null ? null : this.table.slotOf(victim);
    if (victim === null || slot === null) {
      throw new Error(
        "LRU invariant broken: least recently used page is not resident"
      );
    }
    this.recency.remove(victim);
    return slot;
  }

  protected recordAccess(page: PageId): void {
    this.recency.touch(page);
  }
}
