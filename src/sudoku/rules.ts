/*
 * The deductions we make before resorting to guessing.  Each rule removes
 * candidates or fixes cells, and never adds candidates back.
 */

import {Board} from './board';
import {Candidates, countNums, hasNum, numsOf, singleNum} from './candidates';
import {Loc} from './loc';

export enum RuleResult {
  UNCHANGED = 'unchanged',
  CHANGED = 'changed',
  CONTRADICTION = 'contradiction',
}

/** A propagation rule, applied to a whole board at once. */
export declare interface Rule {
  readonly name: string;
  apply(board: Board): RuleResult;
}

/**
 * Runs the given step, turning its success flag and the board's change count
 * into a RuleResult.
 */
function outcome(board: Board, step: () => boolean): RuleResult {
  const before = board.version;
  if (!step()) return RuleResult.CONTRADICTION;
  return board.version === before ? RuleResult.UNCHANGED : RuleResult.CHANGED;
}

/** Removes every fixed numeral from the candidates of the cell's peers. */
export const elimination: Rule = {
  name: 'elimination',
  apply: board =>
    outcome(board, () => {
      for (const loc of Loc.ALL) {
        const num = board.getNum(loc);
        if (num === null) continue;
        for (const peer of board.units.peersOf(loc)) {
          if (!board.eliminate(peer, num)) return false;
        }
      }
      return true;
    }),
};

/** Fixes every blank cell that has a single candidate left. */
export const nakedSingle: Rule = {
  name: 'naked single',
  apply: board =>
    outcome(board, () => {
      for (const loc of Loc.ALL) {
        if (board.getNum(loc) !== null) continue;
        const num = singleNum(board.getCandidates(loc));
        if (num !== null && !board.assign(loc, num)) return false;
      }
      return true;
    }),
};

/**
 * Fixes a numeral that has only one possible place in a unit.  A numeral with
 * no place at all in a unit where it isn't fixed means a contradiction.
 */
export const hiddenSingle: Rule = {
  name: 'hidden single',
  apply: board =>
    outcome(board, () => {
      for (const unit of board.units.all) {
        for (let num = 1; num <= 9; ++num) {
          let place: Loc | null = null;
          let count = 0;
          let isFixed = false;
          for (const loc of unit.locs) {
            if (board.getNum(loc) === num) {
              isFixed = true;
              break;
            }
            if (
              board.getNum(loc) === null &&
              hasNum(board.getCandidates(loc), num)
            ) {
              place = loc;
              ++count;
            }
          }
          if (isFixed) continue;
          if (count === 0) return false;
          if (count === 1 && place && !board.assign(place, num)) return false;
        }
      }
      return true;
    }),
};

/**
 * When exactly two blank cells of a unit have the same two candidates, those
 * two numerals must go in those two cells, so no other cell of the unit can
 * have them.
 */
export const nakedPair: Rule = {
  name: 'naked pair',
  apply: board =>
    outcome(board, () => {
      for (const unit of board.units.all) {
        const locsByPair = new Map<Candidates, Loc[]>();
        for (const loc of unit.locs) {
          if (board.getNum(loc) !== null) continue;
          const cands = board.getCandidates(loc);
          if (countNums(cands) !== 2) continue;
          const locs = locsByPair.get(cands);
          if (locs) locs.push(loc);
          else locsByPair.set(cands, [loc]);
        }
        for (const [pair, twins] of locsByPair) {
          if (twins.length !== 2) continue;
          const nums = numsOf(pair);
          for (const loc of unit.locs) {
            if (twins.includes(loc) || board.getNum(loc) !== null) continue;
            for (const num of nums) {
              if (!board.eliminate(loc, num)) return false;
            }
          }
        }
      }
      return true;
    }),
};

/** The rules `propagate` runs unless told otherwise, in the order it runs them. */
export const DEFAULT_RULES: readonly Rule[] = [
  elimination,
  nakedSingle,
  hiddenSingle,
  nakedPair,
];
