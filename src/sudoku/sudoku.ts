import {InvalidPuzzleError} from './errors';
import {Grid, ReadonlyGrid} from './grid';
import {Units, Variant, isVariant} from './units';

/**
 * The plain-object form of a solved Sudoku, with its grids as flat strings.
 */
export declare interface SudokuRecord {
  variant: Variant;
  clues: string;
  solution: string;
}

/**
 * Describes a solved Sudoku puzzle.
 */
export class Sudoku {
  constructor(
    readonly variant: Variant,
    readonly clues: ReadonlyGrid,
    readonly solution: ReadonlyGrid,
  ) {}

  /** Converts this object to its plain-object form. */
  toRecord(): SudokuRecord {
    return {
      variant: this.variant,
      clues: this.clues.toFlatString(),
      solution: this.solution.toFlatString(),
    };
  }

  /**
   * Converts a plain-object record back to a Sudoku.
   *
   * @throws InvalidPuzzleError if the variant is unknown, either grid is
   *     malformed, the solution is not a valid complete grid, or it disagrees
   *     with a clue.
   */
  static fromRecord(record: SudokuRecord): Sudoku {
    const {variant} = record;
    if (!isVariant(variant)) {
      throw new InvalidPuzzleError(`Unknown Sudoku variant ${variant}`);
    }
    const clues = Grid.fromFlatString(record.clues);
    const solution = Grid.fromFlatString(record.solution);
    if (!solution.isSolved(Units.of(variant))) {
      throw new InvalidPuzzleError(
        `Not a ${variant} Sudoku solution: ${record.solution}`,
      );
    }
    clues.bytes.forEach((num, index) => {
      if (num && num !== solution.bytes[index]) {
        throw new InvalidPuzzleError(
          `Solution disagrees with clue ${num} at position ${index + 1}`,
        );
      }
    });
    return new Sudoku(variant, clues, solution);
  }
}
