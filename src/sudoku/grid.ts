import {InvalidPuzzleError} from './errors';
import {checkIntRange, iota} from './ints';
import {Loc} from './loc';
import {Unit, Units} from './units';

/**
 * A 9x9 grid of optional numerals in the range 1..=9: a Sudoku grid.
 */
export class Grid {
  // The cells of the grid are either 0, meaning blank, or 1..=9, the numeral.
  private readonly array: Uint8Array;

  /** Duplicates a grid, or constructs an empty grid if no grid is supplied. */
  constructor(grid?: ReadonlyGrid) {
    this.array = grid ? new Uint8Array(grid.bytes) : new Uint8Array(81);
  }

  /**
   * Parses an 81-character string, row-major, with dots for blanks.
   *
   * @throws InvalidPuzzleError if the string is the wrong length or has a
   *     character other than '.' and '1'..'9'.
   */
  static fromFlatString(s: string): Grid {
    if (s.length !== 81) {
      throw new InvalidPuzzleError(
        `A puzzle must have exactly 81 characters, got ${s.length}`,
      );
    }
    const grid = new Grid();
    for (const loc of Loc.ALL) {
      const ch = s[loc.index];
      if (ch === '.') continue;
      if (ch < '1' || ch > '9') {
        throw new InvalidPuzzleError(
          `Illegal character ${JSON.stringify(ch)} at position ${loc.index + 1}`,
        );
      }
      grid.set(loc, Number(ch));
    }
    return grid;
  }

  /**
   * Returns this grid's current numeral assignment for the given location, or
   * null.
   */
  get(loc: Loc): number | null {
    return this.array[loc.index] || null;
  }

  /**
   * Assigns the given numeral to the given location, or clears the location if
   * given null.
   */
  set(loc: Loc, num: number | null): void {
    this.array[loc.index] =
      typeof num === 'number' ? checkIntRange(num, 1, 10) : 0;
  }

  /** Returns a read-only view of the array backing the grid. */
  get bytes(): Readonly<Uint8Array> {
    return this.array;
  }

  /** Returns the number of locations with an assigned numeral. */
  getAssignedCount(): number {
    return this.bytes.reduce((count, num) => count + Number(!!num), 0);
  }

  /** Returns the grid as 9 rows of 9 numerals, with 0 for blanks. */
  toRows(): number[][] {
    return iota(9).map(row =>
      Array.from(this.array.subarray(row * 9, row * 9 + 9)),
    );
  }

  /** Returns an ASCII-art version of this grid. */
  toString(): string {
    const lines: string[] = [];
    for (const [row, nums] of this.toRows().entries()) {
      if (row && row % 3 === 0) lines.push('------+-------+------');
      const chars = nums.map(num => (num ? String(num) : '.'));
      lines.push(
        [chars.slice(0, 3), chars.slice(3, 6), chars.slice(6)]
          .map(group => group.join(' '))
          .join(' | '),
      );
    }
    return lines.join('\n');
  }

  /** Returns an 81-character representation of this grid, with dots for blanks. */
  toFlatString(): string {
    return Array.from(this.array, num => (num ? String(num) : '.')).join('');
  }

  /**
   * Finds every unit in which some numeral appears more than once.
   */
  conflicts(units: Units): Conflict[] {
    const answer: Conflict[] = [];
    for (const unit of units.all) {
      const locsByNum = new Map<number, Loc[]>();
      for (const loc of unit.locs) {
        const num = this.get(loc);
        if (num === null) continue;
        const locs = locsByNum.get(num);
        if (locs) locs.push(loc);
        else locsByNum.set(num, [loc]);
      }
      for (const [num, locs] of locsByNum) {
        if (locs.length > 1) answer.push({unit, num, locs});
      }
    }
    return answer;
  }

  /**
   * Returns the set of locations whose numerals collide with another in one of
   * the given units.
   */
  brokenLocs(units: Units): Set<Loc> {
    return new Set(this.conflicts(units).flatMap(c => c.locs));
  }

  /**
   * Tells whether this grid is a complete and valid solution under the given
   * units.
   */
  isSolved(units: Units): boolean {
    return (
      this.array.every(num => num > 0) && this.conflicts(units).length === 0
    );
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set'>;

/** A numeral that appears at more than one location in a unit. */
export declare interface Conflict {
  readonly unit: Unit;
  readonly num: number;
  readonly locs: readonly Loc[];
}
