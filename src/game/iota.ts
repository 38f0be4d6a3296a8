/*
 * Array- and generator-based functions to produce sequences of integers.
 */

import {checkInt} from './ints';

/**
 * A generator that produces the integers from `start` up to but not including
 * `end`.
 *
 * @throws Error if either bound is not an integer.
 */
export function* rangeGenerator(start: number, end: number) {
  checkInt(start);
  checkInt(end);
  for (let i = start; i < end; ++i) {
    yield i;
  }
}

/**
 * Returns an array of `n` integers starting at 0.
 *
 * @param n The exclusive upper bound.
 * @throws Error if `n` is not an integer.
 */
export function iota(n: number): number[] {
  return [...rangeGenerator(0, n)];
}

/** The numerals a Sudoku cell may hold, in ascending order. */
export const NUMERALS: readonly number[] = [...rangeGenerator(1, 10)];
