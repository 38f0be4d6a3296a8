import {checkIntRange} from './ints';
import {iota} from './iota';

/** One of the 81 locations of a Sudoku grid. */
export class Loc extends Object {
  /** The row index, in 0..9. */
  readonly row: number;
  /** The column index, in 0..9. */
  readonly col: number;
  /** The location index, in 0..81. */
  readonly index: number;
  /** The box index, in 0..9, counting boxes in row-major order. */
  readonly box: number;

  private peersCache?: readonly Loc[];

  private constructor(index: number) {
    super();
    this.index = index;
    this.row = Math.floor(index / 9);
    this.col = index % 9;
    this.box = Math.floor(this.row / 3) * 3 + Math.floor(this.col / 3);
  }

  /** The location as an ordered pair, and 1-based rather than 0-based. */
  override toString(): string {
    return `(${this.row + 1}, ${this.col + 1})`;
  }

  /**
   * The 20 other locations that share a row, column or box with this one, in
   * row-major order.
   */
  get peers(): readonly Loc[] {
    if (!this.peersCache) {
      this.peersCache = Loc.ALL.filter(
        loc =>
          loc !== this &&
          (loc.row === this.row || loc.col === this.col || loc.box === this.box),
      );
    }
    return this.peersCache;
  }

  /**
   * The 81 locations of a Sudoku grid, in row-major order.
   */
  static readonly ALL: readonly Loc[] = iota(81).map(i => new Loc(i));

  /** Converts a location index into a Loc. */
  static of(index: number): Loc;

  /** Converts a row-column pair into a Loc. */
  static of(row: number, col: number): Loc;

  static of(rowOrIndex: number, col?: number): Loc {
    if (col === undefined) return Loc.ALL[checkIntRange(rowOrIndex, 0, 81)];
    const row = checkIntRange(rowOrIndex, 0, 9);
    const index = row * 9 + checkIntRange(col, 0, 9);
    return Loc.ALL[index];
  }
}
