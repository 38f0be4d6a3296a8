// Sets of numerals 1..=9 packed into the bits of a number.

import {checkIntRange} from '../game/ints';
import {NUMERALS} from '../game/iota';
import type {Branded} from '../game/types';

/** A subset of the numerals 1..=9; bit `n` is set when `n` is a member. */
export type NumSet = Branded<number, 'NumSet'>;

/** The empty set. */
export const NO_NUMS = 0 as NumSet;

/** The set of all 9 numerals. */
export const ALL_NUMS = numSetOf(NUMERALS);

function bit(num: number): number {
  return 1 << checkIntRange(num, 1, 10);
}

/** Makes a set of the given numerals. */
export function numSetOf(nums: Iterable<number>): NumSet {
  let bits = 0;
  for (const num of nums) bits |= bit(num);
  return bits as NumSet;
}

export function hasNum(set: NumSet, num: number): boolean {
  return (set & bit(num)) !== 0;
}

export function addNum(set: NumSet, num: number): NumSet {
  return (set | bit(num)) as NumSet;
}

export function removeNum(set: NumSet, num: number): NumSet {
  return (set & ~bit(num)) as NumSet;
}

/** The number of numerals in the set. */
export function numSetSize(set: NumSet): number {
  let count = 0;
  for (let bits: number = set; bits; bits &= bits - 1) ++count;
  return count;
}

/** The members of the set, in ascending order. */
export function numSetValues(set: NumSet): number[] {
  return NUMERALS.filter(num => hasNum(set, num));
}

/** Returns the set's only member, or null if it has zero or several. */
export function singleNum(set: NumSet): number | null {
  if (!set || set & (set - 1)) return null;
  return Math.log2(set);
}
