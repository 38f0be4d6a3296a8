import type {ReadonlyGrid} from '../game/grid';
import {iota} from '../game/iota';
import {Loc} from '../game/loc';
import type {SolveResult} from '../solver/types';

export interface FormatOptions {
  /** Whether to put a space between the cells of a row.  Defaults to true. */
  readonly spaced?: boolean;
}

/** Renders a grid as 9 lines, with dots for blanks. */
export function formatGrid(
  grid: ReadonlyGrid,
  {spaced = true}: FormatOptions = {},
): string {
  return iota(9)
    .map(row =>
      iota(9)
        .map(col => String(grid.get(Loc.of(row, col)) ?? '.'))
        .join(spaced ? ' ' : ''),
    )
    .join('\n');
}

/** Renders a solution under a numbered status line. */
export function formatSolution(
  grid: ReadonlyGrid,
  ordinal: number,
  options: FormatOptions = {},
): string {
  return `Solution ${ordinal}:\n${formatGrid(grid, options)}`;
}

/**
 * Renders the line that ends a report: how many solutions there were, and
 * whether there might be more.  No solutions at all is just "no solution".
 */
export function formatSummary(found: number, complete: boolean): string {
  if (!found) return 'no solution';
  const noun = found === 1 ? 'solution' : 'solutions';
  const summary = `Found ${found} ${noun}.`;
  return complete ? summary : `${summary} (search stopped early)`;
}

/**
 * Renders everything a search found: each solution, separated by blank lines,
 * then the summary line.
 */
export function formatReport(
  result: SolveResult,
  options: FormatOptions = {},
): string {
  const {solutions} = result.sudoku;
  const blocks = solutions.map((s, i) => formatSolution(s, i + 1, options));
  return [...blocks, formatSummary(solutions.length, result.complete)].join(
    '\n\n',
  );
}
