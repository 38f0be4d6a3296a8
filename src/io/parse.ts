import {MalformedInputError} from '../game/errors';
import {Grid} from '../game/grid';
import {Loc} from '../game/loc';

/**
 * Reads a puzzle written as 81 cells in row-major order: `1`-`9` for clues,
 * `0` or `.` for blanks.  Whitespace, such as the line breaks of a 9-line
 * layout, is ignored.
 *
 * @throws MalformedInputError if there are not exactly 81 cells, or a cell is
 *     not one of the characters above.
 */
export function parsePuzzle(text: string): Grid {
  const cells = [...text.replace(/\s+/g, '')];
  for (const [i, cell] of cells.entries()) {
    if (!/^[0-9.]$/.test(cell)) {
      throw new MalformedInputError(
        `unexpected character ${JSON.stringify(cell)}`,
        i + 1,
      );
    }
  }
  if (cells.length !== 81) {
    throw new MalformedInputError(`expected 81 cells, got ${cells.length}`);
  }
  const grid = new Grid();
  for (const loc of Loc.ALL) {
    const cell = cells[loc.index];
    if (cell !== '.' && cell !== '0') grid.set(loc, Number(cell));
  }
  return grid;
}
