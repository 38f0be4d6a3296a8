import type {Grid} from '../game/grid';
import type {Sudoku} from '../game/sudoku';

/**
 * Whether a search halts at its first solution or keeps going until the search
 * tree is exhausted (or a limit is reached).
 */
export type SolveMode = 'first' | 'all';

/** Counters describing the work a search did. */
export interface SolveStats {
  /** Tentative assignments made at branching locations. */
  guesses: number;
  /**
   * Assignments forced by a location having a single candidate, or by a
   * numeral having a single place in a row, column or box.
   */
  forced: number;
  /** Branches abandoned because some location ran out of candidates. */
  deadEnds: number;
  /** Solutions emitted. */
  solutions: number;
}

export interface SolveOptions {
  /** Defaults to 'all'. */
  readonly mode?: SolveMode;

  /**
   * In 'all' mode, the most solutions to emit.  Ignored in 'first' mode, which
   * always stops at one.
   */
  readonly maxSolutions?: number;

  /**
   * Whether to fill in locations left with a single candidate as soon as they
   * appear, before branching again.  Defaults to true.  The solutions found
   * are the same either way.
   */
  readonly propagateSingles?: boolean;

  /**
   * Whether to fill in a numeral that has only one possible location left in
   * some row, column or box, and to give up on a branch where a numeral has
   * none.  Defaults to true.  The solutions found are the same either way.
   */
  readonly propagateHiddenSingles?: boolean;

  /**
   * Polled before each branch and each emission; once it returns true, the
   * search stops without emitting anything further.
   */
  readonly shouldStop?: () => boolean;

  /** Called with each solution as it is emitted. */
  readonly onSolution?: (solution: Grid, stats: Readonly<SolveStats>) => void;
}

/** What `solve` reports. */
export interface SolveResult {
  /** The clues together with every solution emitted, in discovery order. */
  readonly sudoku: Sudoku;
  readonly stats: Readonly<SolveStats>;
  /** Wall-clock time of the search, in milliseconds. */
  readonly elapsedMs: number;
  /**
   * True when the search tree was exhausted, so the solutions are all there
   * are; false when a mode, limit or stop condition cut it short.
   */
  readonly complete: boolean;
}
