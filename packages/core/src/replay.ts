import { EMPTY_FRAME, emptyFrameState } from "./frame-table.js";
import type {
  FrameState,
  PageId,
  ReplayMismatch,
  SimulationResult,
  StepRecord,
} from "./types.js";

/** Apply one record to a frame state. The input is not mutated. */
export function replayStep(before: FrameState, record: StepRecord): PageId[] {
  const next = [...before];
  if (record.isFault && record.slot !== null) {
    next[record.slot] = record.pageAccessed;
  }
  return next;
}

/**
 * Replay a history from an empty table and report every place where the
 * recorded trace does not follow from the previous state. An empty list means
 * the history is a faithful state-transition log.
 */
export function verifyHistory(result: SimulationResult): ReplayMismatch[] {
  const mismatches: ReplayMismatch[] = [];
  let state: FrameState = emptyFrameState(result.frameCount);

  for (const record of result.history) {
    const { index } = record;
    const before = record.frameStateBefore;

    if (!sameState(state, before)) {
      mismatches.push({
        index,
        reason: "beforeStateMismatch",
        message: `expected [${state.join(", ")}], recorded [${before.join(", ")}]`,
      });
    }

    const resident = before.includes(record.pageAccessed);
    if (record.isFault === resident) {
      const residency = resident ? "resident" : "not resident";
      mismatches.push({
        index,
        reason: "faultFlagMismatch",
        message: `page ${record.pageAccessed} is ${residency} but isFault is ${record.isFault}`,
      });
    }

    const slotProblem = checkSlot(before, record);
    if (slotProblem !== null) {
      mismatches.push({ index, reason: "slotMismatch", message: slotProblem });
    }

    const next = replayStep(before, record);
    const duplicate = findDuplicate(next);
    if (duplicate !== null) {
      mismatches.push({
        index,
        reason: "duplicateResident",
        message: `page ${duplicate} occupies more than one frame`,
      });
    }
    if (!sameState(next, record.frameStateAfter)) {
      mismatches.push({
        index,
        reason: "afterStateMismatch",
        message: `expected [${next.join(", ")}], recorded [${record.frameStateAfter.join(", ")}]`,
      });
    }

    state = next;
  }

  if (!sameState(state, result.finalFrameState)) {
    mismatches.push({
      index: result.history.length,
      reason: "finalStateMismatch",
      message: `expected [${state.join(", ")}], recorded [${result.finalFrameState.join(", ")}]`,
    });
  }

  return mismatches;
}

function checkSlot(before: FrameState, record: StepRecord): string | null {
  if (!record.isFault) {
    return record.slot === null && record.evictedPage === null
      ? null
      : "a hit must not write a frame";
  }
  if (record.slot === null || record.slot < 0 || record.slot >= before.length) {
    return `fault wrote invalid frame ${String(record.slot)}`;
  }

  const firstEmpty = before.indexOf(EMPTY_FRAME);
  if (firstEmpty !== -1) {
    if (record.slot !== firstEmpty || record.evictedPage !== null) {
      return `fault must fill the first empty frame ${firstEmpty}`;
    }
    return null;
  }
  if (record.evictedPage !== before[record.slot]) {
    const evicted = String(record.evictedPage);
    return `evicted page ${evicted} is not the occupant of frame ${record.slot}`;
  }
  return null;
}

function findDuplicate(state: FrameState): PageId | null {
  const seen = new Set<PageId>();
  for (const page of state) {
    if (page === EMPTY_FRAME) continue;
    if (seen.has(page)) return page;
    seen.add(page);
  }
  return null;
}

function sameState(a: FrameState, b: FrameState): boolean {
  return a.length === b.length && a.every((page, i) => page === b[i]);
}
