import {Grid, type ReadonlyGrid} from '../game/grid';
import {checkIntRange} from '../game/ints';
import {NUMERALS} from '../game/iota';
import {Loc} from '../game/loc';
import {Unit} from '../game/unit';
import {Candidates} from './candidates';
import {hasNum, numSetSize, singleNum} from './num-set';
import type {SolveOptions, SolveStats} from './types';
import {UndoTrail} from './undo-trail';

/**
 * One depth-first search over the completions of a set of clues.  The search
 * owns its grid, candidates and trail, so any number of searches over the same
 * clues can run side by side.
 *
 * Each location is either a clue, a numeral placed by the search, or blank
 * with a non-empty set of candidates.  Branching always picks the blank
 * location with the fewest candidates, and tries them in ascending order.
 * Between branches, locations with a single candidate and numerals with a
 * single place in some unit are filled in, as the options allow.
 */
export class Search {
  readonly stats: SolveStats = {
    guesses: 0,
    forced: 0,
    deadEnds: 0,
    solutions: 0,
  };

  private readonly grid: Grid;
  private readonly candidates: Candidates;
  private readonly trail = new UndoTrail();
  private readonly limit: number;
  private readonly propagateSingles: boolean;
  private readonly propagateHiddenSingles: boolean;
  private started = false;
  private stopped = false;
  private finished = false;

  /**
   * @param clues A conflict-free grid of clues.
   * @param candidates The candidates of `clues`; the search works on a copy.
   */
  constructor(
    clues: ReadonlyGrid,
    candidates: Candidates,
    private readonly options: SolveOptions = {},
  ) {
    this.grid = new Grid(clues);
    this.candidates = new Candidates(candidates);
    const {
      mode = 'all',
      maxSolutions,
      propagateSingles = true,
      propagateHiddenSingles = true,
    } = options;
    this.limit =
      mode === 'first'
        ? 1
        : maxSolutions === undefined
          ? Infinity
          : checkIntRange(maxSolutions, 1, Number.MAX_SAFE_INTEGER + 1);
    this.propagateSingles = propagateSingles;
    this.propagateHiddenSingles = propagateHiddenSingles;
  }

  /**
   * Tells whether the search ran to the end of the search tree, meaning the
   * solutions it emitted are all there are.
   */
  get complete(): boolean {
    return this.finished && !this.stopped;
  }

  /**
   * Runs the search, yielding each solution as a fresh grid.  A search can be
   * run only once.  Abandoning the generator stops the search and rolls its
   * state back.
   */
  *run(): Generator<Grid, void, undefined> {
    if (this.started) throw new Error('Search already run');
    this.started = true;
    const mark = this.trail.mark();
    try {
      if (this.propagate()) {
        yield* this.explore();
      }
      this.finished = true;
    } finally {
      this.trail.rollback(mark, this.grid, this.candidates);
    }
  }

  /** Returns a copy of the search's current candidates. */
  snapshotCandidates(): Candidates {
    return new Candidates(this.candidates);
  }

  private *explore(): Generator<Grid, void, undefined> {
    if (this.isStopped()) return;
    const loc = this.selectLoc();
    if (!loc) {
      yield* this.emit();
      return;
    }
    const nums = this.candidates.getNums(loc);
    if (!nums.length) {
      ++this.stats.deadEnds;
      return;
    }
    for (const num of nums) {
      if (this.isStopped()) return;
      const mark = this.trail.mark();
      ++this.stats.guesses;
      try {
        if (this.assign(loc, num) && this.propagate()) {
          yield* this.explore();
        } else {
          ++this.stats.deadEnds;
        }
      } finally {
        this.trail.rollback(mark, this.grid, this.candidates);
      }
    }
  }

  private *emit(): Generator<Grid, void, undefined> {
    if (this.isStopped()) return;
    const solution = new Grid(this.grid);
    ++this.stats.solutions;
    if (this.stats.solutions >= this.limit) this.stopped = true;
    this.options.onSolution?.(solution, {...this.stats});
    yield solution;
  }

  /**
   * Returns the blank location with the fewest candidates, the first in
   * row-major order among ties, or null if the grid is full.
   */
  private selectLoc(): Loc | null {
    let best: Loc | null = null;
    let bestSize = 10;
    for (const loc of Loc.ALL) {
      if (this.grid.get(loc)) continue;
      const size = numSetSize(this.candidates.get(loc));
      if (size < bestSize) {
        best = loc;
        bestSize = size;
        if (size <= 1) break;
      }
    }
    return best;
  }

  private assign(loc: Loc, num: number): boolean {
    return this.trail.place(loc, num, this.grid, this.candidates);
  }

  /**
   * Fills in forced numerals until there are none left: locations with a
   * single candidate, and numerals that fit in only one location of some unit,
   * each when its option is on.
   *
   * @returns False if that leaves some location without candidates, or some
   *     numeral without a place in a unit.
   */
  private propagate(): boolean {
    const {propagateSingles, propagateHiddenSingles} = this;
    let progressed = propagateSingles || propagateHiddenSingles;
    while (progressed) {
      progressed = false;
      if (propagateSingles) {
        for (const loc of Loc.ALL) {
          if (this.grid.get(loc)) continue;
          const num = singleNum(this.candidates.get(loc));
          if (num === null) continue;
          ++this.stats.forced;
          if (!this.assign(loc, num)) return false;
          progressed = true;
        }
      }
      if (propagateHiddenSingles) {
        for (const unit of Unit.ALL) {
          for (const num of NUMERALS) {
            const places = this.placesFor(unit, num);
            if (!places || places.length > 1) continue;
            if (!places.length) return false;
            ++this.stats.forced;
            if (!this.assign(places[0], num)) return false;
            progressed = true;
          }
        }
      }
    }
    return true;
  }

  /**
   * Returns the blank locations of a unit that could take a numeral, or null
   * if the unit already has it.
   */
  private placesFor(unit: Unit, num: number): Loc[] | null {
    const places: Loc[] = [];
    for (const loc of unit.locs) {
      const placed = this.grid.get(loc);
      if (placed === num) return null;
      if (!placed && hasNum(this.candidates.get(loc), num)) places.push(loc);
    }
    return places;
  }

  private isStopped(): boolean {
    if (!this.stopped && this.options.shouldStop?.()) this.stopped = true;
    return this.stopped;
  }
}
