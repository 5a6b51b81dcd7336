/**
 * Equality across differing representations
 *
 * Numbers of different widths compare after widening the smaller one;
 * strings and byte sequences compare after UTF-8 conversion.
 */

import { equal } from './equal.js';
import { NUMERIC_SIZES, type Numeric, canConvertNumeric, convertNumeric, numericEquals } from './numeric.js';
import { inspect, typeKey } from './shape.js';
import type { Inspected } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Whether `from`'s type may be converted to `to`'s type: numeric to numeric
 * (complex only to complex), text to and from bytes, and identical types.
 */
export function isConvertible(from: Inspected, to: Inspected): boolean {
  if (from.shape === 'nil' || to.shape === 'nil') return false;
  if (from.shape === 'numeric' && to.shape === 'numeric') {
    return canConvertNumeric(from.value.type, to.value.type);
  }
  if (from.shape === 'text' && to.shape === 'bytes') return true;
  if (from.shape === 'bytes' && to.shape === 'text') return true;
  return from.shape === to.shape && typeKey(from) === typeKey(to);
}

// Converts a non-numeric value to the shape of `to`; undefined when impossible
function convertTo(from: Inspected, to: Inspected): { value: unknown } | undefined {
  if (from.shape === 'text' && to.shape === 'bytes') {
    return { value: encoder.encode(from.value) };
  }
  if (from.shape === 'bytes' && to.shape === 'text') {
    try {
      return { value: decoder.decode(from.value) };
    } catch {
      // Invalid UTF-8 has no string form
      return undefined;
    }
  }
  return { value: from.value };
}

function equalNumerics(expected: Numeric, actual: Numeric): boolean {
  // Always widen: the smaller representation converts to the larger type.
  // On a size tie, actual converts to expected's type.
  if (NUMERIC_SIZES[expected.type] >= NUMERIC_SIZES[actual.type]) {
    const converted = convertNumeric(actual, expected.type);
    return converted !== undefined && numericEquals(converted, expected);
  }
  const converted = convertNumeric(expected, actual.type);
  return converted !== undefined && numericEquals(converted, actual);
}

/**
 * Equality that also accepts values that are equal after conversion.
 *
 * @example
 * ```ts
 * equalValues(int8(5), int64(5)) // => true
 * equalValues(int16(300), int8(44)) // => false, 300 is never narrowed
 * equalValues('hi', Buffer.from('hi')) // => true
 * ```
 */
export function equalValues(expected: unknown, actual: unknown): boolean {
  if (equal(expected, actual)) return true;

  const left = inspect(expected);
  const right = inspect(actual);
  if (!isConvertible(left, right)) return false;

  if (left.shape === 'numeric' && right.shape === 'numeric') {
    return equalNumerics(left.value, right.value);
  }

  const converted = convertTo(left, right);
  return converted !== undefined && equal(converted.value, actual);
}
