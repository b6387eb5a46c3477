/*
 * Candidate sets: the numerals still possible in a cell, as 9-bit masks.  Bit
 * `n - 1` is set when numeral `n` is a candidate.
 */

import {checkNum} from './ints';

/** A set of numerals in 1..=9, packed into the low 9 bits of a number. */
export type Candidates = number;

/** The empty candidate set: a cell with no possible numeral. */
export const NO_CANDIDATES: Candidates = 0;

/** Every numeral, 1 through 9. */
export const ALL_CANDIDATES: Candidates = 0x1ff;

/** Returns the candidate set holding just `num`. */
export function bitOf(num: number): Candidates {
  return 1 << (checkNum(num) - 1);
}

/** Returns the candidate set holding the given numerals. */
export function candidatesOf(...nums: number[]): Candidates {
  return nums.reduce((set, num) => set | bitOf(num), NO_CANDIDATES);
}

/** Tells whether `num` is in the given set. */
export function hasNum(set: Candidates, num: number): boolean {
  return (set & bitOf(num)) !== 0;
}

/** Returns the given set without `num`. */
export function withoutNum(set: Candidates, num: number): Candidates {
  return set & ~bitOf(num);
}

/** Counts the numerals in the given set. */
export function countNums(set: Candidates): number {
  let count = 0;
  for (let bits = set; bits; bits &= bits - 1) ++count;
  return count;
}

/**
 * Returns the sole numeral of the given set, or null if it has zero or several.
 */
export function singleNum(set: Candidates): number | null {
  if (!set || set & (set - 1)) return null;
  return 32 - Math.clz32(set);
}

/** Lists the numerals in the given set in ascending order. */
export function numsOf(set: Candidates): number[] {
  const nums: number[] = [];
  for (let num = 1; num <= 9; ++num) {
    if (set & (1 << (num - 1))) nums.push(num);
  }
  return nums;
}
