import {MalformedInputError} from './errors';
import {checkIntRange, isIntInRange} from './ints';
import {iota} from './iota';
import {Loc} from './loc';
import type {GridRows, GridString} from './types';
import {Unit} from './unit';

/** Two locations in one unit that hold the same numeral. */
export interface Conflict {
  readonly locs: readonly [Loc, Loc];
  readonly unit: Unit;
  readonly num: number;
}

/**
 * Equivalent to a 9x9 grid of optional numerals in the range 1..=9: a Sudoku
 * grid.
 */
export class Grid {
  // The cells of the grid are either 0, meaning blank, or 1..=9, the numeral.
  private readonly array: Uint8Array;

  /** Duplicates a grid, or constructs an empty grid if no grid is supplied. */
  constructor(grid?: ReadonlyGrid) {
    this.array = grid ? new Uint8Array(grid.bytes) : new Uint8Array(81);
  }

  /**
   * Builds a grid from 9 rows of 9 integers, 0 meaning blank.
   *
   * @throws MalformedInputError if the rows are not 9 arrays of 9 integers in
   *     the range 0..=9.
   */
  static fromRows(rows: GridRows): Grid {
    if (rows.length !== 9) {
      throw new MalformedInputError(`expected 9 rows, got ${rows.length}`);
    }
    const grid = new Grid();
    rows.forEach((row, r) => {
      if (row.length !== 9) {
        throw new MalformedInputError(
          `expected 9 cells in row ${r + 1}, got ${row.length}`,
        );
      }
      row.forEach((num, c) => {
        if (!isIntInRange(num, 0, 10)) {
          throw new MalformedInputError(
            `${num} is not a numeral 0..9`,
            r * 9 + c + 1,
          );
        }
        grid.array[r * 9 + c] = num;
      });
    });
    return grid;
  }

  /**
   * Returns this grid's current numeral assignment for the given location, or
   * null.
   */
  get(loc: Loc): number | null {
    return this.array[loc.index] || null;
  }

  /**
   * Assigns the given numeral to the given location, or clears the location if
   * given null.
   */
  set(loc: Loc, num: number | null): void {
    this.array[loc.index] =
      typeof num === 'number' ? checkIntRange(num, 1, 10) : 0;
  }

  /** Returns a read-only view of the array backing the grid. */
  get bytes(): Readonly<Uint8Array> {
    return this.array;
  }

  /** Returns the number of locations with an assigned numeral. */
  getAssignedCount(): number {
    return this.bytes.reduce((count, num) => count + Number(!!num), 0);
  }

  /** Tells whether every location has a numeral. */
  isComplete(): boolean {
    return this.array.every(num => num > 0);
  }

  /**
   * Finds the first pair of locations, scanning units in order, that share a
   * unit and a numeral.  Returns null when there is none.
   */
  findConflict(): Conflict | null {
    for (const unit of Unit.ALL) {
      const seen: Array<Loc | undefined> = [];
      for (const loc of unit.locs) {
        const num = this.array[loc.index];
        if (!num) continue;
        const prev = seen[num];
        if (prev) return {locs: [prev, loc], unit, num};
        seen[num] = loc;
      }
    }
    return null;
  }

  /**
   * Tells whether this grid is a valid Sudoku solution.
   */
  isSolved(): boolean {
    return this.isComplete() && !this.findConflict();
  }

  /** Returns the grid as 9 rows of 9 numerals, 0 meaning blank. */
  toRows(): number[][] {
    return iota(9).map(r => Array.from(this.array.subarray(r * 9, r * 9 + 9)));
  }

  /** Returns the grid as 9 lines of 9 characters, with dots for blanks. */
  toString(): string {
    return iota(9)
      .map(r => this.toFlatString().slice(r * 9, r * 9 + 9))
      .join('\n');
  }

  /** Returns an 81-character representation of this grid, with dots for blanks. */
  toFlatString(): GridString {
    let answer = '';
    for (const num of this.array) answer += num ? String(num) : '.';
    return answer as GridString;
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set'>;
