import { validateReferenceSequence } from "./config.js";
import { FrameTable } from "./frame-table.js";
import type {
  PageId,
  PolicyName,
  ReplacementPolicy,
  SimulationResult,
  StepRecord,
} from "./types.js";

/**
 * The loop shared by every policy: snapshot, hit/fault decision, empty-slot
 * fill, and one history record per reference. Subclasses only decide which
 * occupied frame to overwrite.
 */
export abstract class PagingPolicy implements ReplacementPolicy {
  abstract readonly name: PolicyName;
  readonly frameCount: number;
  protected readonly table: FrameTable;

  constructor(frameCount: number) {
    this.table = new FrameTable(frameCount);
    this.frameCount = frameCount;
  }

  simulate(sequence: readonly PageId[]): SimulationResult {
    const pages = validateReferenceSequence(sequence);
    this.reset();

    const history: StepRecord[] = [];
    let faultCount = 0;

    for (let index = 0; index < pages.length; index++) {
      const page = pages[index];
      const before = this.table.snapshot();
      const isFault = !this.table.isResident(page);
      let slot: number | null = null;
      let evictedPage: PageId | null = null;

      if (isFault) {
        faultCount++;
        slot = this.table.firstEmptySlot();
        if (slot === null) {
          slot = this.selectVictimSlot(pages, index);
          evictedPage = before[slot];
        }
        this.table.assign(slot, page);
      }

      this.recordAccess(page);

      history.push({
        index,
        pageAccessed: page,
        frameStateBefore: before,
        frameStateAfter: this.table.snapshot(),
        isFault,
        slot,
        evictedPage,
      });
    }

    return {
      policy: this.name,
      frameCount: this.frameCount,
      faultCount,
      finalFrameState: this.table.snapshot(),
      history,
    };
  }

  protected reset(): void {
    this.table.clear();
  }

  /**
   * Pick the frame to overwrite when every frame is occupied. Called only on
   * a fault, before the faulting page is assigned.
   */
  protected abstract selectVictimSlot(
    sequence: readonly PageId[],
    index: number
  ): number;

  /** Called once per reference, hit or fault, after the table is updated. */
  protected recordAccess(_page: PageId): void {}
}
