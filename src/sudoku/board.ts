import {
  ALL_CANDIDATES,
  Candidates,
  bitOf,
  countNums,
  hasNum,
  numsOf,
  singleNum,
} from './candidates';
import {InvalidPuzzleError} from './errors';
import {Grid, ReadonlyGrid} from './grid';
import {checkNum} from './ints';
import {Loc} from './loc';
import {Units, Variant, describeUnit} from './units';

/**
 * A Sudoku in the middle of being solved: each cell is either fixed to a
 * numeral or holds the set of numerals still possible there.
 *
 * Boards are mutable.  The search makes a `clone` before every guess, so a
 * failed guess is undone by throwing its clone away.
 */
export class Board {
  /** The fixed numeral of each location, or 0. */
  private readonly nums: Uint8Array;
  /** The candidates of each location; a fixed cell holds just its numeral. */
  private readonly cands: Uint16Array;
  private changes: number;

  private constructor(
    readonly units: Units,
    nums: Uint8Array,
    cands: Uint16Array,
    changes: number,
  ) {
    this.nums = nums;
    this.cands = cands;
    this.changes = changes;
  }

  /**
   * Parses a puzzle string and sets up the board for the given variant.
   *
   * @throws InvalidPuzzleError if the string is malformed or two clues collide
   *     in one of the variant's units.
   */
  static fromPuzzle(puzzle: string, variant: Variant = 'standard'): Board {
    return Board.fromGrid(Grid.fromFlatString(puzzle), variant);
  }

  /**
   * Sets up a board whose fixed cells are the given grid's clues, with every
   * clue removed from its peers' candidates.  Nothing cascades from there, so
   * a blank cell may be left with no candidates at all.
   *
   * @throws InvalidPuzzleError if two clues collide in one of the variant's
   *     units.
   */
  static fromGrid(clues: ReadonlyGrid, variant: Variant = 'standard'): Board {
    const units = Units.of(variant);
    const [conflict] = clues.conflicts(units);
    if (conflict) {
      throw new InvalidPuzzleError(
        `Clue ${conflict.num} appears more than once in ${describeUnit(conflict.unit)}`,
        conflict.locs,
      );
    }
    const nums = new Uint8Array(clues.bytes);
    const cands = new Uint16Array(81).fill(ALL_CANDIDATES);
    for (const loc of Loc.ALL) {
      const num = nums[loc.index];
      if (num) cands[loc.index] = bitOf(num);
    }
    for (const loc of Loc.ALL) {
      const num = nums[loc.index];
      if (!num) continue;
      for (const peer of units.peersOf(loc)) {
        if (!nums[peer.index]) cands[peer.index] &= ~bitOf(num);
      }
    }
    return new Board(units, nums, cands, 0);
  }

  get variant(): Variant {
    return this.units.variant;
  }

  /**
   * Counts the changes made to this board: every candidate removed and every
   * cell fixed.  Unchanged across a call means the call made no progress.
   */
  get version(): number {
    return this.changes;
  }

  /** Returns the numeral fixed at the given location, or null. */
  getNum(loc: Loc): number | null {
    return this.nums[loc.index] || null;
  }

  /** Returns the candidate set of the given location. */
  getCandidates(loc: Loc): Candidates {
    return this.cands[loc.index];
  }

  /** Returns the candidates of the given location, in ascending order. */
  getNums(loc: Loc): number[] {
    return numsOf(this.cands[loc.index]);
  }

  /** Counts the cells that are not fixed yet. */
  unfixedCount(): number {
    return this.nums.reduce((count, num) => count + Number(!num), 0);
  }

  /**
   * Fixes a numeral at a location, removes it from the candidates of every
   * peer, and follows through: a peer left with a single candidate is assigned
   * in turn.
   *
   * @returns false if this leads to a contradiction, in which case the board
   *     is left partially updated and should be discarded.
   */
  assign(loc: Loc, num: number): boolean {
    checkNum(num);
    const {index} = loc;
    const fixed = this.nums[index];
    if (fixed) return fixed === num;
    if (!hasNum(this.cands[index], num)) return false;
    this.nums[index] = num;
    this.cands[index] = bitOf(num);
    ++this.changes;
    for (const peer of this.units.peersOf(loc)) {
      if (!this.eliminate(peer, num)) return false;
    }
    return true;
  }

  /**
   * Removes a numeral from a location's candidates, assigning the location if
   * only one candidate remains.
   *
   * @returns false if this leads to a contradiction: the location is fixed to
   *     `num`, or has no candidates left.
   */
  eliminate(loc: Loc, num: number): boolean {
    const {index} = loc;
    const fixed = this.nums[index];
    if (fixed) return fixed !== num;
    const bit = bitOf(num);
    const before = this.cands[index];
    if (!(before & bit)) return true;
    const after = before & ~bit;
    this.cands[index] = after;
    ++this.changes;
    const single = singleNum(after);
    if (single !== null) return this.assign(loc, single);
    return after !== 0;
  }

  /** Tells whether every cell is fixed, with no numeral repeated in a unit. */
  isSolved(): boolean {
    return this.nums.every(num => num > 0) && !this.hasRepeats();
  }

  /**
   * Tells whether the board can't be completed: a blank cell has no
   * candidates, or a unit repeats a fixed numeral.
   */
  isContradiction(): boolean {
    for (const loc of Loc.ALL) {
      if (!this.nums[loc.index] && !this.cands[loc.index]) return true;
    }
    return this.hasRepeats();
  }

  private hasRepeats(): boolean {
    for (const unit of this.units.all) {
      let seen = 0;
      for (const loc of unit.locs) {
        const num = this.nums[loc.index];
        if (!num) continue;
        const bit = bitOf(num);
        if (seen & bit) return true;
        seen |= bit;
      }
    }
    return false;
  }

  /** Copies this board.  The units are shared, since they never change. */
  clone(): Board {
    return new Board(
      this.units,
      new Uint8Array(this.nums),
      new Uint16Array(this.cands),
      this.changes,
    );
  }

  /** Returns a grid of the fixed cells, with the rest blank. */
  toGrid(): Grid {
    const grid = new Grid();
    for (const loc of Loc.ALL) grid.set(loc, this.getNum(loc));
    return grid;
  }

  /** Returns the fixed cells as an 81-character string, dots for the rest. */
  toFlatString(): string {
    return this.toGrid().toFlatString();
  }

  /** Counts the candidates of the given location. */
  countCandidates(loc: Loc): number {
    return countNums(this.cands[loc.index]);
  }
}
