import {MalformedInputError} from '../game/errors';
import {UNIQUE_PUZZLE} from '../game/fake-data';
import {Loc} from '../game/loc';
import {parsePuzzle} from './parse';

describe(`parsePuzzle`, () => {
  it(`reads a 9-line layout`, () => {
    const grid = parsePuzzle(UNIQUE_PUZZLE);
    expect(grid.toFlatString().slice(0, 18)).toBe('.4.61.925.51...746');
    expect(grid.getAssignedCount()).toBe(48);
  });

  it(`ignores any whitespace and takes dots as blanks`, () => {
    const text = '1 2 3\t4\r\n' + '.'.repeat(77);
    const grid = parsePuzzle(text);
    expect(grid.get(Loc.of(0))).toBe(1);
    expect(grid.get(Loc.of(3))).toBe(4);
    expect(grid.get(Loc.of(4))).toBe(null);
    expect(grid.getAssignedCount()).toBe(4);
  });

  it(`rejects 80 cells`, () => {
    expect(() => parsePuzzle('0'.repeat(80))).toThrow(
      new MalformedInputError('expected 81 cells, got 80'),
    );
  });

  it(`rejects 82 cells`, () => {
    expect(() => parsePuzzle('0'.repeat(82))).toThrow(
      'Malformed puzzle: expected 81 cells, got 82',
    );
  });

  it(`rejects a letter and says where it is`, () => {
    const flat = UNIQUE_PUZZLE.replace(/\s+/g, '');
    const text = flat.slice(0, 10) + 'x' + flat.slice(11);
    expect(() => parsePuzzle(text)).toThrow(
      'Malformed puzzle: unexpected character "x" at position 11',
    );
  });

  it(`counts a character outside the basic plane as one cell`, () => {
    expect(() => parsePuzzle('1\u{1F600}3' + '.'.repeat(78))).toThrow(
      'Malformed puzzle: unexpected character "\u{1F600}" at position 2',
    );
    expect(() => parsePuzzle('..\u{1F600}')).toThrow(
      'Malformed puzzle: unexpected character "\u{1F600}" at position 3',
    );
  });

  it(`rejects punctuation other than dots`, () => {
    expect(() => parsePuzzle('-'.repeat(81))).toThrow(MalformedInputError);
  });
});
