import type {ReadonlyGrid} from './grid';

/**
 * Describes a Sudoku puzzle: its clues, and the solutions found for them.
 */
export class Sudoku {
  constructor(
    readonly clues: ReadonlyGrid,
    readonly solutions: readonly ReadonlyGrid[],
  ) {}

  /** Tells whether exactly one solution was found. */
  get isUnique(): boolean {
    return this.solutions.length === 1;
  }

  /** Tells whether no solution was found. */
  get isUnsolvable(): boolean {
    return this.solutions.length === 0;
  }
}
