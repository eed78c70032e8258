import type { PageId } from "./types.js";

export type SimulationErrorCode =
  | "INVALID_FRAME_COUNT"
  | "INVALID_PAGE"
  | "UNKNOWN_POLICY"
  | "INVALID_REFERENCE";

export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SimulationError";
  }
}

export class InvalidFrameCountError extends SimulationError {
  constructor(public readonly frameCount: unknown) {
    super(
      `Frame count must be a positive integer, got ${String(frameCount)}`,
      "INVALID_FRAME_COUNT",
      { frameCount }
    );
    this.name = "InvalidFrameCountError";
  }
}

/** A reference that cannot be a page id: negative (the empty sentinel) or not an integer. */
export class InvalidPageError extends SimulationError {
  constructor(
    public readonly page: unknown,
    public readonly index: number
  ) {
    super(
      `Invalid page ${String(page)} at reference ${index}: page ids are non-negative integers`,
      "INVALID_PAGE",
      { page, index }
    );
    this.name = "InvalidPageError";
  }
}

export class UnknownPolicyError extends SimulationError {
  constructor(public readonly policy: unknown) {
    super(`Unknown replacement policy "${String(policy)}"`, "UNKNOWN_POLICY", {
      policy,
    });
    this.name = "UnknownPolicyError";
  }
}

/** Raised while parsing reference-string text into page ids. */
export class InvalidReferenceError extends SimulationError {
  constructor(
    public readonly token: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(
      `Invalid page reference "${token}" on line ${line}, column ${column}`,
      "INVALID_REFERENCE",
      { token, line, column }
    );
    this.name = "InvalidReferenceError";
  }
}

export function isPageId(value: unknown): value is PageId {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}
