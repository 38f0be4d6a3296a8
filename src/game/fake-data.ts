// Puzzles shared by the tests.

/** A puzzle with a single solution, laid out as 9 lines. */
export const UNIQUE_PUZZLE = `
040610925
051000746
926000813
080050071
090100032
013470598
000000189
162800357
809001264
`;

export const UNIQUE_SOLUTION =
  '748613925351928746926745813284359671597186432613472598435267189162894357879531264';

/**
 * A puzzle that needs several guesses, with a single solution.
 */
export const GUESSING_PUZZLE =
  '046903000003050060900002003005006000800000010010780200000000050081300007000800104';

export const GUESSING_SOLUTION =
  '146973582723458961958612473375126849892534716614789235467291358281345697539867124';

/**
 * `UNIQUE_SOLUTION` with a 1/8 rectangle blanked out at rows 4 and 6, columns
 * 2 and 9: both ways of filling it in are solutions.
 */
export const TWO_SOLUTION_PUZZLE =
  '748613925351928746926745813' +
  '2.435967.597186432' +
  '6.347259.' +
  '435267189162894357879531264';

export const TWO_SOLUTIONS = [
  '748613925351928746926745813214359678597186432683472591435267189162894357879531264',
  UNIQUE_SOLUTION,
];

/**
 * No duplicated clues, but the top right location can't hold anything: its
 * row has 1-8 and its column has 9.
 */
export const UNSATISFIABLE_PUZZLE =
  '12345678.' + '.'.repeat(27) + '........9' + '.'.repeat(36);

/** Two 5s in the top row. */
export const CONTRADICTORY_PUZZLE = '55' + '.'.repeat(79);

export const BLANK_PUZZLE = '0'.repeat(81);
