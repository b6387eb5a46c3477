import {getMaxSteps} from '../system/config';
import {EventType, logEvent} from '../system/log';
import {Board} from './board';
import {SolverError, UnsolvableError} from './errors';
import {Rule} from './rules';
import {SearchStats, emptyStats, search} from './search';
import {Sudoku} from './sudoku';
import {Variant} from './units';

export declare interface SolveOptions {
  /** Which rules the puzzle follows; standard by default. */
  readonly variant?: Variant;
  /** The propagation rules to run, in order.  Defaults to all of them. */
  readonly rules?: readonly Rule[];
  /** The search budget; defaults to the configured `getMaxSteps()`. */
  readonly maxSteps?: number;
}

/** What `solveReport` found, and what it took to find it. */
export declare interface SolveReport {
  readonly sudoku: Sudoku;
  readonly stats: SearchStats;
  readonly elapsedMs: number;
}

/**
 * Solves a puzzle and reports how the search went.
 *
 * @param puzzle 81 characters, row-major, '1'..'9' for clues and '.' for
 *     blanks.
 * @throws InvalidPuzzleError if the puzzle is malformed or its clues collide.
 * @throws UnsolvableError if the puzzle has no solution.
 * @throws SearchLimitError if the search budget runs out first.
 */
export function solveReport(
  puzzle: string,
  options: SolveOptions = {},
): SolveReport {
  const {variant = 'standard', rules, maxSteps = getMaxSteps()} = options;
  const startTimeMs = Date.now();
  const stats = emptyStats();
  try {
    const board = Board.fromPuzzle(puzzle, variant);
    const clues = board.toGrid();
    const solved = search(board, {rules, maxSteps}, stats);
    if (!solved) throw new UnsolvableError(puzzle, variant);
    const elapsedMs = Date.now() - startTimeMs;
    logEvent(EventType.SYSTEM, {
      category: `solved ${variant}`,
      detail: `${puzzle}; ${stats.nodes} nodes, ${stats.backtracks} backtracks`,
      elapsedMs,
    });
    return {
      sudoku: new Sudoku(variant, clues, solved.toGrid()),
      stats,
      elapsedMs,
    };
  } catch (e: unknown) {
    if (e instanceof SolverError) {
      logEvent(EventType.ERROR, {
        category: `${e.name} solving ${variant}`,
        detail: e.message,
        elapsedMs: Date.now() - startTimeMs,
      });
    }
    throw e;
  }
}

/**
 * Solves a puzzle of the given variant.
 *
 * @param puzzle 81 characters, row-major, '1'..'9' for clues and '.' for
 *     blanks.
 * @returns The solution as 81 numerals, row-major.
 * @throws InvalidPuzzleError if the puzzle is malformed or its clues collide.
 * @throws UnsolvableError if the puzzle has no solution.
 */
export function solve(puzzle: string, variant: Variant = 'standard'): string {
  return solveReport(puzzle, {variant}).sudoku.solution.toFlatString();
}
