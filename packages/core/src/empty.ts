import { isZeroNumeric } from './numeric.js';
import { fieldsOf, inspect } from './shape.js';

/**
 * Whether a value is the zero value of its type.
 *
 * Only nil is the zero value of collections, references, callables and
 * channels, so an empty array held in a field is not zero.
 */
export function isZero(value: unknown, seen: Set<object> = new Set()): boolean {
  const inspected = inspect(value);
  switch (inspected.shape) {
    case 'nil':
      return true;
    case 'boolean':
      return inspected.value === false;
    case 'numeric':
      return isZeroNumeric(inspected.value);
    case 'text':
      return inspected.value === '';
    case 'composite': {
      if (seen.has(inspected.value)) return true;
      seen.add(inspected.value);
      return fieldsOf(inspected.value).every((field) => isZero(field.value, seen));
    }
    default:
      return false;
  }
}

/**
 * Check if value is "empty"
 *
 * - nil is empty
 * - lists, byte sequences, sets, maps and channels are empty when they hold nothing
 * - references are empty when nil or when their target is empty
 * - everything else is empty when it is the zero value of its type
 */
export function isEmpty(value: unknown): boolean {
  const inspected = inspect(value);
  switch (inspected.shape) {
    case 'nil':
      return true;
    case 'sequence':
    case 'bytes':
      return inspected.value.length === 0;
    case 'set':
    case 'mapping':
      return inspected.value.size === 0;
    case 'channel':
      return inspected.value.readableLength === 0;
    case 'reference':
      return inspected.value.isNil || isEmpty(inspected.value.target);
    default:
      return isZero(value);
  }
}
