/** A page identifier. Negative values are reserved for the empty-frame sentinel. */
export type PageId = number;

/** Contents of every frame, in frame-index order. Empty slots hold `EMPTY_FRAME`. */
export type FrameState = readonly PageId[];

/** The replacement policies the simulator knows about. */
export type PolicyName = "lru" | "optimal";

export interface SimulationConfig {
  /** Number of physical frames. Must be a positive integer. */
  frameCount: number;
  policy: PolicyName;
}

/** One record per reference processed, in reference order. */
export interface StepRecord {
  /** 0-based position of this reference in the sequence. */
  index: number;
  /** The page referenced at this step. */
  pageAccessed: PageId;
  /** Frame contents BEFORE this step mutates the table. */
  frameStateBefore: FrameState;
  /** Frame contents AFTER this step's assignment (equal to `frameStateBefore` on a hit). */
  frameStateAfter: FrameState;
  /** True iff `pageAccessed` was not resident in `frameStateBefore`. */
  isFault: boolean;
  /** The frame written at this step, or null on a hit. */
  slot: number | null;
  /** The page removed from `slot`, or null when nothing was evicted. */
  evictedPage: PageId | null;
}

/** The complete outcome of one simulation run. */
export interface SimulationResult {
  policy: PolicyName;
  frameCount: number;
  faultCount: number;
  /** Frame contents after the last reference was processed. */
  finalFrameState: FrameState;
  history: readonly StepRecord[];
}

export interface ReplacementPolicy {
  readonly name: PolicyName;
  readonly frameCount: number;
  /**
   * Run the policy over a full reference sequence. Internal state is reset at
   * the start of every call, so one instance can serve any number of runs.
   */
  simulate(sequence: readonly PageId[]): SimulationResult;
}

export interface SimulationSummary {
  references: number;
  faults: number;
  hits: number;
  /** `faults / references`, or null for an empty sequence. */
  faultRate: number | null;
  hitRate: number | null;
}

export interface PolicyComparison {
  lru: SimulationResult;
  optimal: SimulationResult;
  /** `lru.faultCount - optimal.faultCount`. Never negative. */
  difference: number;
}

/** A step whose replay disagrees with the recorded history. */
export interface ReplayMismatch {
  /** Step index, or `history.length` for a final-state mismatch. */
  index: number;
  reason:
    | "beforeStateMismatch"
    | "afterStateMismatch"
    | "faultFlagMismatch"
    | "slotMismatch"
    | "duplicateResident"
    | "finalStateMismatch";
  message: string;
}

export interface BreakpointCondition {
  /** Break when this page is referenced. */
  page?: PageId;
  /** Break on faults (true) or hits (false). */
  onFault?: boolean;
  /** Break when this page is evicted. */
  evictedPage?: PageId;
}

export interface Breakpoint {
  id: string;
  condition: BreakpointCondition;
}
