import {Loc} from './loc';
import {Variant} from './units';

/** The base class of every error the solver reports. */
export class SolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The puzzle string is malformed, or two of its clues collide in a unit.
 */
export class InvalidPuzzleError extends SolverError {
  constructor(
    message: string,
    /** The locations at fault, when the problem is colliding clues. */
    readonly locs: readonly Loc[] = [],
  ) {
    super(message);
  }
}

/** Search ran out of possibilities without finding a solution. */
export class UnsolvableError extends SolverError {
  constructor(
    readonly clues: string,
    readonly variant: Variant,
  ) {
    super(`No ${variant} Sudoku solution exists for ${clues}`);
  }
}

/** Search visited more nodes than it was allowed to. */
export class SearchLimitError extends SolverError {
  constructor(readonly maxSteps: number) {
    super(`Search exceeded its budget of ${maxSteps} steps`);
  }
}
