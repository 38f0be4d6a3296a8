import {ContradictoryGivensError} from '../game/errors';
import {Grid, type ReadonlyGrid} from '../game/grid';
import {Sudoku} from '../game/sudoku';
import type {GridRows} from '../game/types';
import {EventType, logEvent} from '../system/log';
import {Candidates} from './candidates';
import {Search} from './search';
import type {SolveOptions, SolveResult} from './types';

export type {SolveMode, SolveOptions, SolveResult, SolveStats} from './types';

/**
 * Finds the solutions of a Sudoku puzzle.  Construction checks the clues;
 * after that, searching never throws.
 */
export class Solver {
  /** The puzzle's clues. */
  readonly clues: ReadonlyGrid;
  private readonly candidates: Candidates;

  /**
   * @param clues The puzzle, as a grid or as 9 rows of 9 numerals with 0 for
   *     blank cells.
   * @throws MalformedInputError if rows are given that are not 9 by 9 numerals
   *     0..=9.
   * @throws ContradictoryGivensError if two clues in a row, column or box hold
   *     the same numeral.
   */
  constructor(clues: ReadonlyGrid | GridRows) {
    const grid = 'bytes' in clues ? new Grid(clues) : Grid.fromRows(clues);
    const conflict = grid.findConflict();
    if (conflict) {
      throw new ContradictoryGivensError(
        conflict.locs,
        conflict.unit,
        conflict.num,
      );
    }
    this.clues = grid;
    this.candidates = Candidates.fromGrid(grid);
  }

  /** Sets up a new, independent search of the puzzle. */
  search(options: SolveOptions = {}): Search {
    return new Search(this.clues, this.candidates, options);
  }

  /**
   * Lazily produces the puzzle's solutions in the order the search finds
   * them.  Stop pulling whenever you have enough.
   */
  solutions(options: SolveOptions = {}): Generator<Grid, void, undefined> {
    return this.search(options).run();
  }
}

/**
 * Runs a search to its end, handing each solution to `consume` as the search
 * emits it, and logs how long that took.
 *
 * @returns The elapsed milliseconds.
 */
export function runSearch(
  search: Search,
  consume: (solution: Grid) => void,
): number {
  const startTimeMs = Date.now();
  for (const solution of search.run()) consume(solution);
  const elapsedMs = Date.now() - startTimeMs;
  const {stats} = search;
  logEvent(EventType.SYSTEM, {
    category: 'solve time',
    detail: `${stats.solutions} solution(s), ${stats.guesses} guesses`,
    elapsedMs,
  });
  logEvent(EventType.DEBUG, {
    category: 'solve stats',
    detail: JSON.stringify(stats),
  });
  return elapsedMs;
}

/**
 * Solves a puzzle, collecting the solutions a search emits under the given
 * options.
 *
 * @throws MalformedInputError or ContradictoryGivensError, as `Solver` does.
 */
export function solve(
  clues: ReadonlyGrid | GridRows,
  options: SolveOptions = {},
): SolveResult {
  const solver = new Solver(clues);
  const search = solver.search(options);
  const solutions: Grid[] = [];
  const elapsedMs = runSearch(search, solution => solutions.push(solution));
  return {
    sudoku: new Sudoku(solver.clues, solutions),
    stats: search.stats,
    elapsedMs,
    complete: search.complete,
  };
}
