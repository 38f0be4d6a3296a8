import {
  addNum,
  ALL_NUMS,
  hasNum,
  NO_NUMS,
  numSetOf,
  numSetSize,
  numSetValues,
  removeNum,
  singleNum,
} from './num-set';

describe(`NumSet`, () => {
  it(`holds all nine numerals when full`, () => {
    expect(numSetSize(ALL_NUMS)).toBe(9);
    expect(numSetValues(ALL_NUMS)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(numSetValues(NO_NUMS)).toEqual([]);
  });

  it(`adds and removes members`, () => {
    let set = numSetOf([7, 2]);
    expect(numSetValues(set)).toEqual([2, 7]);
    set = addNum(set, 9);
    set = removeNum(set, 2);
    expect(numSetValues(set)).toEqual([7, 9]);
    expect(hasNum(set, 7)).toBe(true);
    expect(hasNum(set, 2)).toBe(false);
  });

  it(`finds a lone member`, () => {
    expect(singleNum(numSetOf([6]))).toBe(6);
    expect(singleNum(numSetOf([6, 8]))).toBe(null);
    expect(singleNum(NO_NUMS)).toBe(null);
  });

  it(`rejects numerals outside 1..9`, () => {
    expect(() => numSetOf([0])).toThrow('0 out of range 1..10');
    expect(() => hasNum(ALL_NUMS, 10)).toThrow('10 out of range 1..10');
  });
});
