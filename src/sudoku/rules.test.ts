import {Board} from './board';
import {Loc} from './loc';
import {
  RuleResult,
  elimination,
  hiddenSingle,
  nakedPair,
  nakedSingle,
} from './rules';
import {CLASSIC, EMPTY} from './test-puzzles';

describe(`rules`, () => {
  describe(`elimination`, () => {
    it(`has nothing to do on a freshly built board`, () => {
      const board = Board.fromPuzzle(CLASSIC);
      expect(elimination.apply(board)).toBe(RuleResult.UNCHANGED);
      expect(board.version).toBe(0);
    });
  });

  describe(`nakedSingle`, () => {
    it(`fixes a cell with one candidate`, () => {
      const board = Board.fromPuzzle('12345678.' + '.'.repeat(72));
      expect(board.getNum(Loc.of(0, 8))).toBeNull();
      expect(nakedSingle.apply(board)).toBe(RuleResult.CHANGED);
      expect(board.getNum(Loc.of(0, 8))).toBe(9);
      expect(nakedSingle.apply(board)).toBe(RuleResult.UNCHANGED);
    });
  });

  describe(`hiddenSingle`, () => {
    it(`fixes the only place left for a numeral in a unit`, () => {
      const board = Board.fromPuzzle(EMPTY);
      for (let col = 0; col < 9; ++col) {
        if (col !== 4) board.eliminate(Loc.of(0, col), 5);
      }
      const before = board.version;
      expect(hiddenSingle.apply(board)).toBe(RuleResult.CHANGED);
      expect(board.getNum(Loc.of(0, 4))).toBe(5);
      expect(board.unfixedCount()).toBe(80);
      // The assignment, then 5 struck from 8 cells of column 5 and 4 more of
      // box 2.
      expect(board.version - before).toBe(13);
    });

    it(`reports a numeral with no place in a unit`, () => {
      const board = Board.fromPuzzle(EMPTY);
      for (let col = 0; col < 9; ++col) board.eliminate(Loc.of(0, col), 5);
      expect(hiddenSingle.apply(board)).toBe(RuleResult.CONTRADICTION);
    });
  });

  describe(`nakedPair`, () => {
    it(`strikes the pair from the rest of each shared unit`, () => {
      const board = Board.fromPuzzle(EMPTY);
      for (const loc of [Loc.of(0, 0), Loc.of(0, 1)]) {
        for (let num = 3; num <= 9; ++num) board.eliminate(loc, num);
      }
      expect(nakedPair.apply(board)).toBe(RuleResult.CHANGED);
      // Same row
      expect(board.getNums(Loc.of(0, 5))).toEqual([3, 4, 5, 6, 7, 8, 9]);
      // Same box
      expect(board.getNums(Loc.of(1, 1))).toEqual([3, 4, 5, 6, 7, 8, 9]);
      // Same column as one of them, but no pair there
      expect(board.getNums(Loc.of(4, 0))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(board.getNums(Loc.of(0, 0))).toEqual([1, 2]);
      expect(nakedPair.apply(board)).toBe(RuleResult.UNCHANGED);
    });

    it(`ignores three cells sharing a pair`, () => {
      const board = Board.fromPuzzle(EMPTY);
      for (const loc of [Loc.of(0, 0), Loc.of(0, 1), Loc.of(0, 2)]) {
        for (let num = 3; num <= 9; ++num) board.eliminate(loc, num);
      }
      expect(nakedPair.apply(board)).toBe(RuleResult.UNCHANGED);
      expect(board.getNums(Loc.of(0, 5))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it(`runs on diagonals too`, () => {
      const board = Board.fromPuzzle(EMPTY, 'diagonal');
      for (const loc of [Loc.of(0, 0), Loc.of(8, 8)]) {
        for (let num = 3; num <= 9; ++num) board.eliminate(loc, num);
      }
      expect(nakedPair.apply(board)).toBe(RuleResult.CHANGED);
      expect(board.getNums(Loc.of(4, 4))).toEqual([3, 4, 5, 6, 7, 8, 9]);
      expect(board.getNums(Loc.of(0, 8))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });
  });
});
