import {
  TWO_SOLUTION_PUZZLE,
  TWO_SOLUTIONS,
  UNIQUE_SOLUTION,
} from '../game/fake-data';
import {Sudoku} from '../game/sudoku';
import type {SolveResult} from '../solver/types';
import {
  formatGrid,
  formatReport,
  formatSolution,
  formatSummary,
} from './format';
import {parsePuzzle} from './parse';

function resultOf(solutions: string[], complete: boolean): SolveResult {
  return {
    sudoku: new Sudoku(
      parsePuzzle(TWO_SOLUTION_PUZZLE),
      solutions.map(parsePuzzle),
    ),
    stats: {guesses: 0, forced: 0, deadEnds: 0, solutions: solutions.length},
    elapsedMs: 0,
    complete,
  };
}

const SPACED_SOLUTION = [
  '7 4 8 6 1 3 9 2 5',
  '3 5 1 9 2 8 7 4 6',
  '9 2 6 7 4 5 8 1 3',
  '2 8 4 3 5 9 6 7 1',
  '5 9 7 1 8 6 4 3 2',
  '6 1 3 4 7 2 5 9 8',
  '4 3 5 2 6 7 1 8 9',
  '1 6 2 8 9 4 3 5 7',
  '8 7 9 5 3 1 2 6 4',
].join('\n');

describe(`formatGrid`, () => {
  it(`separates cells with spaces by default`, () => {
    expect(formatGrid(parsePuzzle(UNIQUE_SOLUTION))).toBe(SPACED_SOLUTION);
  });

  it(`can leave the spaces out`, () => {
    const lines = formatGrid(parsePuzzle(UNIQUE_SOLUTION), {spaced: false});
    expect(lines.split('\n')[0]).toBe('748613925');
  });

  it(`shows blanks as dots`, () => {
    const lines = formatGrid(parsePuzzle(TWO_SOLUTION_PUZZLE));
    expect(lines.split('\n')[3]).toBe('2 . 4 3 5 9 6 7 .');
  });
});

describe(`formatSolution`, () => {
  it(`puts a status line above the grid`, () => {
    expect(formatSolution(parsePuzzle(UNIQUE_SOLUTION), 3)).toBe(
      `Solution 3:\n${SPACED_SOLUTION}`,
    );
  });
});

describe(`formatSummary`, () => {
  it(`counts the solutions`, () => {
    expect(formatSummary(1, true)).toBe('Found 1 solution.');
    expect(formatSummary(1680, true)).toBe('Found 1680 solutions.');
  });

  it(`notes a search that stopped early`, () => {
    expect(formatSummary(3, false)).toBe(
      'Found 3 solutions. (search stopped early)',
    );
  });

  it(`says when there is no solution`, () => {
    expect(formatSummary(0, true)).toBe('no solution');
    expect(formatSummary(0, false)).toBe('no solution');
  });
});

describe(`formatReport`, () => {
  it(`says when there is no solution`, () => {
    expect(formatReport(resultOf([], true))).toBe('no solution');
  });

  it(`shows a lone solution and counts it`, () => {
    expect(formatReport(resultOf([UNIQUE_SOLUTION], true))).toBe(
      `Solution 1:\n${SPACED_SOLUTION}\n\nFound 1 solution.`,
    );
  });

  it(`separates solutions with blank lines`, () => {
    const report = formatReport(resultOf(TWO_SOLUTIONS, true), {
      spaced: false,
    });
    expect(report.split('\n\n')).toEqual([
      `Solution 1:\n${formatGrid(parsePuzzle(TWO_SOLUTIONS[0]), {spaced: false})}`,
      `Solution 2:\n${formatGrid(parsePuzzle(TWO_SOLUTIONS[1]), {spaced: false})}`,
      'Found 2 solutions.',
    ]);
  });

  it(`notes a search that stopped early`, () => {
    const report = formatReport(resultOf(TWO_SOLUTIONS.slice(0, 1), false));
    expect(report.split('\n').pop()).toBe(
      'Found 1 solution. (search stopped early)',
    );
  });
});
