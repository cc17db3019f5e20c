import { describe, it, expect } from 'vitest';
import { normalizeIndex } from '../indexing';
import { IndexOutOfRangeError, TypeConversionError } from '../../types';

describe('normalizeIndex', () => {
  const items = ['a', 'b', 'c'];

  it('should return non-negative indexes unchanged', () => {
    expect(normalizeIndex(items, 0)).toBe(0);
    expect(normalizeIndex(items, 2)).toBe(2);
  });

  it('should count negative indexes from the end', () => {
    expect(normalizeIndex(items, -1)).toBe(2);
    expect(normalizeIndex(items, -3)).toBe(0);
  });

  it('should reject indexes past either end', () => {
    expect(() => normalizeIndex(items, 3)).toThrow(IndexOutOfRangeError);
    expect(() => normalizeIndex(items, -4)).toThrow('Index -4 is out of range for length 3');
  });

  it('should reject every index of an empty sequence', () => {
    expect(() => normalizeIndex([], 0)).toThrow(IndexOutOfRangeError);
    expect(() => normalizeIndex([], -1)).toThrow(IndexOutOfRangeError);
  });

  it('should reject non-integers', () => {
    expect(() => normalizeIndex(items, 1.5)).toThrow(TypeConversionError);
  });

  it('should carry index and length on the error', () => {
    try {
      normalizeIndex(items, 5);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(IndexOutOfRangeError);
      if (error instanceof IndexOutOfRangeError) {
        expect(error.index).toBe(5);
        expect(error.length).toBe(3);
        expect(error.code).toBe('INDEX_OUT_OF_RANGE');
      }
    }
  });
});
