import { describe, it, expect } from "vitest";
import { simulate, compare, createPolicy } from "../src/simulate.js";
import { parseSimulationConfig } from "../src/config.js";
import { verifyHistory } from "../src/replay.js";
import { LruPolicy } from "../src/lru-policy.js";
import { OptimalPolicy } from "../src/optimal-policy.js";
import {
  InvalidFrameCountError,
  InvalidPageError,
  UnknownPolicyError,
} from "../src/errors.js";
import { EMPTY_FRAME } from "../src/frame-table.js";
import type { PolicyName } from "../src/types.js";
import { BELADY_SEQUENCE, pseudoRandomSequence } from "./fixtures.js";

const POLICIES: PolicyName[] = ["lru", "optimal"];

const SEQUENCES = [
  BELADY_SEQUENCE,
  [7, 0, 1, 2, 0, 3, 0, 4, 2, 3, 0, 3, 2, 1, 2, 0, 1, 7, 0, 1],
  pseudoRandomSequence(1, 40, 6),
  pseudoRandomSequence(7, 60, 9),
  pseudoRandomSequence(42, 25, 3),
];

const FRAME_COUNTS = [1, 2, 3, 4, 5];

describe("simulate", () => {
  it("builds the requested policy", () => {
    expect(createPolicy({ frameCount: 2, policy: "lru" })).toBeInstanceOf(LruPolicy);
    expect(createPolicy({ frameCount: 2, policy: "optimal" })).toBeInstanceOf(
      OptimalPolicy
    );
  });

  it("returns an empty result for an empty sequence", () => {
    for (const policy of POLICIES) {
      const result = simulate({ frameCount: 3, policy }, []);
      expect(result.faultCount).toBe(0);
      expect(result.history).toEqual([]);
      expect(result.finalFrameState).toEqual([
        EMPTY_FRAME,
        EMPTY_FRAME,
        EMPTY_FRAME,
      ]);
    }
  });

  it("rejects a non-positive frame count", () => {
    expect(() => simulate({ frameCount: 0, policy: "lru" }, [1])).toThrow(
      InvalidFrameCountError
    );
    expect(() => simulate({ frameCount: 2.5, policy: "optimal" }, [1])).toThrow(
      InvalidFrameCountError
    );
  });

  it("rejects the whole run on a negative page", () => {
    let caught: unknown;
    try {
      simulate({ frameCount: 2, policy: "lru" }, [1, -1, 2]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidPageError);
    if (caught instanceof InvalidPageError) {
      expect(caught.index).toBe(1);
      expect(caught.page).toBe(-1);
      expect(caught.code).toBe("INVALID_PAGE");
    }
  });

  it("rejects non-integer pages", () => {
    expect(() => simulate({ frameCount: 2, policy: "optimal" }, [1, 2.5])).toThrow(
      InvalidPageError
    );
  });

  it("rejects pages beyond the safe integer range", () => {
    let caught: unknown;
    try {
      simulate({ frameCount: 2, policy: "lru" }, [1, 9007199254740992]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidPageError);
    if (caught instanceof InvalidPageError) {
      expect(caught.index).toBe(1);
      expect(caught.page).toBe(9007199254740992);
    }
  });

  it("faults exactly once per distinct page when every page fits", () => {
    for (const policy of POLICIES) {
      const result = simulate({ frameCount: 5, policy }, BELADY_SEQUENCE);
      expect(result.faultCount).toBe(5);
      expect(result.finalFrameState).toEqual([1, 2, 3, 4, 5]);
    }
  });
});

describe("simulation properties", () => {
  for (const policy of POLICIES) {
    for (const [s, sequence] of SEQUENCES.entries()) {
      for (const frameCount of FRAME_COUNTS) {
        const label = `${policy}, sequence ${s}, ${frameCount} frame(s)`;

        it(`holds every invariant (${label})`, () => {
          const result = simulate({ frameCount, policy }, sequence);

          // Determinism.
          expect(simulate({ frameCount, policy }, sequence)).toEqual(result);

          // History completeness and fault bounds.
          expect(result.history).toHaveLength(sequence.length);
          expect(result.faultCount).toBeLessThanOrEqual(sequence.length);
          expect(result.faultCount).toBe(
            result.history.filter((step) => step.isFault).length
          );

          // First occurrences always fault.
          const seen = new Set<number>();
          for (const step of result.history) {
            if (!seen.has(step.pageAccessed)) {
              expect(step.isFault).toBe(true);
              seen.add(step.pageAccessed);
            }
          }

          // Occupancy bound and no duplicate residents.
          for (const step of result.history) {
            const residents = step.frameStateBefore.filter(
              (page) => page !== EMPTY_FRAME
            );
            expect(step.frameStateBefore).toHaveLength(frameCount);
            expect(new Set(residents).size).toBe(residents.length);
          }

          // Every page fits: one fault per distinct page.
          if (frameCount >= seen.size) {
            expect(result.faultCount).toBe(seen.size);
          }

          // The history replays step by step.
          expect(verifyHistory(result)).toEqual([]);
        });
      }
    }
  }

  for (const [s, sequence] of SEQUENCES.entries()) {
    for (const frameCount of FRAME_COUNTS) {
      it(`optimal never faults more than LRU (sequence ${s}, ${frameCount} frame(s))`, () => {
        const { lru, optimal, difference } = compare(frameCount, sequence);
        expect(optimal.faultCount).toBeLessThanOrEqual(lru.faultCount);
        expect(difference).toBe(lru.faultCount - optimal.faultCount);
      });
    }
  }
});

describe("compare", () => {
  it("runs both policies on the textbook string", () => {
    const comparison = compare(3, BELADY_SEQUENCE);
    expect(comparison.lru.faultCount).toBe(10);
    expect(comparison.optimal.faultCount).toBe(7);
    expect(comparison.difference).toBe(3);
  });
});

describe("parseSimulationConfig", () => {
  it("accepts a valid config", () => {
    expect(parseSimulationConfig({ frameCount: 3, policy: "optimal" })).toEqual({
      frameCount: 3,
      policy: "optimal",
    });
  });

  it("reports an unknown policy", () => {
    expect(() => parseSimulationConfig({ frameCount: 3, policy: "fifo" })).toThrow(
      UnknownPolicyError
    );
    expect(() => parseSimulationConfig({ frameCount: 3, policy: "fifo" })).toThrow(
      'Unknown replacement policy "fifo"'
    );
  });

  it("reports the frame count first when both fields are wrong", () => {
    expect(() => parseSimulationConfig({ frameCount: 0, policy: "fifo" })).toThrow(
      "Frame count must be a positive integer, got 0"
    );
  });

  it("rejects a config that is not an object", () => {
    expect(() => parseSimulationConfig(null)).toThrow(InvalidFrameCountError);
  });
});
