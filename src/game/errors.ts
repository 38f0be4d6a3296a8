import type {Loc} from './loc';
import type {Unit} from './unit';

/** Stable identifiers for the ways a puzzle can be rejected. */
export enum PuzzleErrorCode {
  MALFORMED_INPUT = 'MALFORMED_INPUT',
  CONTRADICTORY_GIVENS = 'CONTRADICTORY_GIVENS',
}

/**
 * Base class for the checked failures of puzzle initialization.  Once a
 * puzzle has been accepted, searching it never throws.
 */
export abstract class PuzzleError extends Error {
  abstract readonly code: PuzzleErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The input does not describe 81 cells of numerals 0..9: the wrong number of
 * cells, or a character or value that is not a numeral.
 */
export class MalformedInputError extends PuzzleError {
  readonly code = PuzzleErrorCode.MALFORMED_INPUT;

  /**
   * @param reason What is wrong with the input.
   * @param position The 1-based position of the offending cell, when there
   *     is one.
   */
  constructor(
    readonly reason: string,
    readonly position?: number,
  ) {
    super(
      position === undefined
        ? `Malformed puzzle: ${reason}`
        : `Malformed puzzle: ${reason} at position ${position}`,
    );
  }
}

/** Two clues in the same unit hold the same numeral. */
export class ContradictoryGivensError extends PuzzleError {
  readonly code = PuzzleErrorCode.CONTRADICTORY_GIVENS;

  constructor(
    readonly locs: readonly [Loc, Loc],
    readonly unit: Unit,
    readonly num: number,
  ) {
    super(
      `Contradictory givens: ${num} appears at ${locs[0]} and ${locs[1]} in ${unit}`,
    );
  }
}
