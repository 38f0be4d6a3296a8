import type {ReadonlyGrid} from '../game/grid';
import {Loc} from '../game/loc';
import {
  ALL_NUMS,
  hasNum,
  addNum,
  NO_NUMS,
  type NumSet,
  numSetValues,
  removeNum,
} from './num-set';

/**
 * The pencil marks of a search in progress: for each location, the set of
 * numerals not yet ruled out there.  Locations holding a numeral have an
 * empty set.
 */
export class Candidates {
  private readonly sets: Uint16Array;

  /** Clones another Candidates. */
  constructor(candidates: Candidates);

  /** Makes a Candidates with every location empty. */
  constructor();

  constructor(candidates?: Candidates) {
    this.sets = candidates
      ? new Uint16Array(candidates.sets)
      : new Uint16Array(81);
  }

  /**
   * Bootstraps the candidates of a grid: each blank location gets the
   * numerals that none of its peers hold.
   */
  static fromGrid(grid: ReadonlyGrid): Candidates {
    const candidates = new Candidates();
    for (const loc of Loc.ALL) {
      if (grid.get(loc)) continue;
      let set = ALL_NUMS;
      for (const peer of loc.peers) {
        const num = grid.get(peer);
        if (num) set = removeNum(set, num);
      }
      candidates.sets[loc.index] = set;
    }
    return candidates;
  }

  /** Returns the set of numerals still possible at the given location. */
  get(loc: Loc): NumSet {
    return this.sets[loc.index] as NumSet;
  }

  /** Returns the numerals still possible at the given location, ascending. */
  getNums(loc: Loc): number[] {
    return numSetValues(this.get(loc));
  }

  /**
   * Rules out a numeral at a location.
   *
   * @returns Whether the numeral had been possible there.
   */
  eliminate(loc: Loc, num: number): boolean {
    const set = this.get(loc);
    if (!hasNum(set, num)) return false;
    this.sets[loc.index] = removeNum(set, num);
    return true;
  }

  /** Makes a numeral possible again at a location. */
  restore(loc: Loc, num: number): void {
    this.sets[loc.index] = addNum(this.get(loc), num);
  }

  /** Replaces the set at a location, emptying it by default. */
  reset(loc: Loc, set: NumSet = NO_NUMS): void {
    this.sets[loc.index] = set;
  }

  /** Tells whether this and another Candidates hold the same sets. */
  equals(other: Candidates): boolean {
    return this.sets.every((set, i) => set === other.sets[i]);
  }
}
