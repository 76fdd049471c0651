import { describe, it, expect } from 'vitest';
import { naturalCompare, reverseComparator } from '../comparators.js';
import { InvalidKeyError } from '../errors.js';

describe('naturalCompare', () => {
  it('should order numbers', () => {
    expect(naturalCompare(1, 2)).toBe(-1);
    expect(naturalCompare(2, 1)).toBe(1);
    expect(naturalCompare(-0, 0)).toBe(0);
    expect(naturalCompare(Number.NEGATIVE_INFINITY, -1e308)).toBe(-1);
  });

  it('should order strings by code unit rather than locale', () => {
    expect(naturalCompare('B', 'a')).toBe(-1);
    expect(naturalCompare('apple', 'apples')).toBe(-1);
    expect(naturalCompare('same', 'same')).toBe(0);
  });

  it('should order bigints, booleans and dates', () => {
    expect(naturalCompare(10n, 9n)).toBe(1);
    expect(naturalCompare(false, true)).toBe(-1);
    expect(naturalCompare(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-02T00:00:00Z'))).toBe(-1);
    expect(naturalCompare(new Date(5), new Date(5))).toBe(0);
  });

  it('should reject NaN and invalid dates', () => {
    expect(() => naturalCompare(Number.NaN, 1)).toThrow(InvalidKeyError);
    expect(() => naturalCompare(new Date('not a date'), new Date(0))).toThrow('Invalid key Invalid Date: invalid Date has no ordering');
  });

  it('should reject mixed key kinds', () => {
    expect(() => naturalCompare(1, '1')).toThrow('Invalid key "1": a string key cannot be compared with a number key');
    expect(() => naturalCompare(1, true)).toThrow(InvalidKeyError);
    expect(() => naturalCompare(new Date(1), 1)).toThrow(InvalidKeyError);
  });

  it('should reject keys without a natural ordering', () => {
    expect(() => naturalCompare({}, {})).toThrow('no natural ordering; pass a compare function');
    expect(() => naturalCompare(null, null)).toThrow(InvalidKeyError);
  });
});

describe('reverseComparator', () => {
  it('should flip the ordering', () => {
    const descending = reverseComparator<number>(naturalCompare);
    expect(descending(1, 2)).toBe(1);
    expect(descending(2, 1)).toBe(-1);
    expect(descending(3, 3)).toBe(0);
    expect([3, 1, 2].sort(descending)).toEqual([3, 2, 1]);
  });
});
