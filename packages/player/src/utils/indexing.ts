import { IndexOutOfRangeError, TypeConversionError } from '../types/errors';

/**
 * Convert a possibly negative index into a plain one
 *
 * Negative indexes count from the end (`-1` is the last element).
 *
 * @throws IndexOutOfRangeError when the index falls outside the sequence
 * @throws TypeConversionError when the index is not an integer
 */
export function normalizeIndex(sequence: { readonly length: number }, index: number): number {
  if (!Number.isInteger(index)) {
    throw new TypeConversionError(`Index must be an integer, got ${index}`, ['integer'], {
      index,
    });
  }

  const length = sequence.length;
  if (index < 0) {
    if (Math.abs(index) > length) {
      throw new IndexOutOfRangeError(
        `Index ${index} is out of range for length ${length}`,
        index,
        length
      );
    }
    return length + index;
  }

  if (index > length - 1) {
    throw new IndexOutOfRangeError(`Index ${index} is out of range for length ${length}`, index, length);
  }
  return index;
}
