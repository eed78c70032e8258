import type {
  Breakpoint,
  BreakpointCondition,
  FrameState,
  SimulationResult,
  StepRecord,
} from "./types.js";

/**
 * Steps a viewer through a finished simulation. Positions `0..history.length`
 * are valid; the last one is a virtual "end" position that shows the final
 * frame state.
 */
export class ReplaySession {
  readonly result: SimulationResult;

  private _position: number = 0;
  private readonly faultPrefix: number[];
  private readonly breakpoints = new Map<string, Breakpoint>();
  private nextBreakpointId = 1;

  constructor(result: SimulationResult) {
    this.result = result;
    this.faultPrefix = [0];
    for (const step of result.history) {
      this.faultPrefix.push(
        this.faultPrefix[this.faultPrefix.length - 1] + (step.isFault ? 1 : 0)
      );
    }
  }

  get position(): number {
    return this._position;
  }

  get lastPosition(): number {
    return this.result.history.length;
  }

  get currentStep(): StepRecord | null {
    if (this.isAtEnd) {
      return null;
    }
    return this.result.history[this._position];
  }

  get isAtEnd(): boolean {
    return this._position === this.lastPosition;
  }

  /** Frames as they stood when the current step's decision was made. */
  get frames(): FrameState {
    const step = this.currentStep;
    return step ? step.frameStateBefore : this.result.finalFrameState;
  }

  /** Faults that happened before the current position. */
  get faultsSoFar(): number {
    return this.faultPrefix[this._position];
  }

  // --- Navigation ---

  stepForward(): void {
    if (this._position < this.lastPosition) {
      this._position++;
    }
  }

  stepBackward(): void {
    if (this._position > 0) {
      this._position--;
    }
  }

  jumpTo(position: number): void {
    this._position = Math.max(0, Math.min(position, this.lastPosition));
  }

  jumpToStart(): void {
    this._position = 0;
  }

  jumpToEnd(): void {
    this._position = this.lastPosition;
  }

  // --- Breakpoints ---

  addBreakpoint(condition: BreakpointCondition): Breakpoint {
    const breakpoint: Breakpoint = {
      id: `bp-${this.nextBreakpointId++}`,
      condition: { ...condition },
    };
    this.breakpoints.set(breakpoint.id, breakpoint);
    return breakpoint;
  }

  removeBreakpoint(id: string): boolean {
    return this.breakpoints.delete(id);
  }

  getBreakpoints(): Breakpoint[] {
    return [...this.breakpoints.values()];
  }

  /**
   * Move to the next step that hits a breakpoint. Returns false, leaving the
   * session at the end, when there is none.
   */
  continueForward(): boolean {
    const { history } = this.result;
    for (let p = this._position + 1; p < history.length; p++) {
      if (this.hitsBreakpoint(history[p])) {
        this._position = p;
        return true;
      }
    }
    this._position = this.lastPosition;
    return false;
  }

  /**
   * Move to the previous step that hits a breakpoint. Returns false, leaving
   * the session at the start, when there is none.
   */
  continueBackward(): boolean {
    const { history } = this.result;
    for (let p = Math.min(this._position, history.length) - 1; p >= 0; p--) {
      if (this.hitsBreakpoint(history[p])) {
        this._position = p;
        return true;
      }
    }
    this._position = 0;
    return false;
  }

  private hitsBreakpoint(step: StepRecord): boolean {
    for (const { condition } of this.breakpoints.values()) {
      if (matches(condition, step)) return true;
    }
    return false;
  }
}

/** Every field the condition sets must match; an empty condition matches any step. */
function matches(condition: BreakpointCondition, step: StepRecord): boolean {
  if (condition.page !== undefined && condition.page !== step.pageAccessed) {
    return false;
  }
  if (condition.onFault !== undefined && condition.onFault !== step.isFault) {
    return false;
  }
  if (
    condition.evictedPage !== undefined &&
    condition.evictedPage !== step.evictedPage
  ) {
    return false;
  }
  return true;
}
