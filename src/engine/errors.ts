import type { Pos } from "./types";

export type SolverErrorCode =
  | "INVARIANT_VIOLATION"
  | "UNSATISFIABLE"
  | "UNSATISFIABLE_COMPONENT"
  | "INVALID_OBSERVATION"
  | "INVALID_CONFIG";

/**
 * Base of every error a cycle raises. Contradictions surface as
 * {@link UnsatisfiableConstraintError} when the reducer meets them first and
 * as its subclass {@link UnsatisfiableComponentError} when only the exact
 * search does; catch the base class to handle both.
 */
export class SolverError extends Error {
  constructor(message: string, public readonly code: SolverErrorCode) {
    super(message);
    this.name = "SolverError";
  }
}

// Upstream observation or logic bug; the cycle is aborted before commit
export class InvariantViolationError extends SolverError {
  constructor(message: string, public readonly pos?: Pos) {
    super(message, "INVARIANT_VIOLATION");
    this.name = "InvariantViolationError";
  }
}

export class UnsatisfiableConstraintError extends SolverError {
  constructor(
    message: string,
    public readonly cells: Pos[] = [],
    code: SolverErrorCode = "UNSATISFIABLE",
  ) {
    super(message, code);
    this.name = "UnsatisfiableConstraintError";
  }
}

export class UnsatisfiableComponentError extends UnsatisfiableConstraintError {
  constructor(cells: Pos[], public readonly constraints: Pos[]) {
    super(
      `No mine assignment satisfies a component of ${cells.length} cells and ${constraints.length} constraints.`,
      cells,
      "UNSATISFIABLE_COMPONENT",
    );
    this.name = "UnsatisfiableComponentError";
  }
}

export class InvalidObservationError extends SolverError {
  constructor(message: string) {
    super(message, "INVALID_OBSERVATION");
    this.name = "InvalidObservationError";
  }
}

export class InvalidConfigError extends SolverError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "InvalidConfigError";
  }
}

export function describePos(pos: Pos): string {
  return `(${pos.row}, ${pos.col})`;
}
