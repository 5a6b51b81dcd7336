/**
 * Deep structural equality
 *
 * One recursive walk serves both equal() and findMismatch(): it stops at the
 * first difference and reports where it is as a JSON Pointer.
 */

import { numericEquals } from './numeric.js';
import { elementsOf, fieldsOf, inspect, typeKey, typeName } from './shape.js';
import { type Inspected, type Mismatch, MismatchCode } from './types.js';
import { appendPath, preview } from './utils.js';

// Pairs currently being compared; a pair met again is part of a cycle
type Seen = Map<object, Set<object>>;

// Compares a pair while it is marked as under comparison. The mark is removed
// afterwards, so a failed trial comparison never makes a later one pass.
function guarded(
  seen: Seen,
  expected: object,
  actual: object,
  comparison: () => Mismatch | null,
): Mismatch | null {
  let partners = seen.get(expected);
  if (!partners) {
    partners = new Set();
    seen.set(expected, partners);
  }
  if (partners.has(actual)) return null;
  partners.add(actual);
  try {
    return comparison();
  } finally {
    partners.delete(actual);
    if (partners.size === 0) seen.delete(expected);
  }
}

function typeMismatch(path: string, expected: unknown, actual: unknown): Mismatch {
  const expectedType = typeName(expected);
  const actualType = typeName(actual);
  return {
    path,
    code: MismatchCode.TYPE_MISMATCH,
    message: `Expected ${expectedType}, got ${actualType}`,
    expected: expectedType,
    actual: actualType,
  };
}

function valueMismatch(path: string, expected: unknown, actual: unknown): Mismatch {
  return {
    path,
    code: MismatchCode.VALUE_MISMATCH,
    message: `Expected ${preview(expected)}, got ${preview(actual)}`,
    expected: preview(expected),
    actual: preview(actual),
  };
}

function lengthMismatch(path: string, expected: number, actual: number): Mismatch {
  return {
    path,
    code: MismatchCode.LENGTH_MISMATCH,
    message: `Expected length ${expected}, got ${actual}`,
    expected: String(expected),
    actual: String(actual),
  };
}

function nilMismatch(path: string, expected: unknown, actual: unknown): Mismatch {
  return {
    path,
    code: MismatchCode.NIL_MISMATCH,
    message: `Expected ${preview(expected)}, got ${preview(actual)}`,
    expected: typeName(expected),
    actual: typeName(actual),
  };
}

function compareBytes(expected: Uint8Array, actual: Uint8Array, path: string): Mismatch | null {
  if (expected.length !== actual.length) {
    return lengthMismatch(path, expected.length, actual.length);
  }
  for (let i = 0; i < expected.length; i++) {
    if (expected[i] !== actual[i]) {
      return valueMismatch(appendPath(path, i), expected[i], actual[i]);
    }
  }
  return null;
}

function compareSequences(
  expected: unknown[],
  actual: unknown[],
  path: string,
  seen: Seen,
): Mismatch | null {
  if (expected.length !== actual.length) {
    return lengthMismatch(path, expected.length, actual.length);
  }
  for (let i = 0; i < expected.length; i++) {
    const result = compare(expected[i], actual[i], appendPath(path, i), seen);
    if (result) return result;
  }
  return null;
}

function compareSets(
  expected: ReadonlySet<unknown>,
  actual: ReadonlySet<unknown>,
  path: string,
  seen: Seen,
): Mismatch | null {
  if (expected.size !== actual.size) {
    return lengthMismatch(path, expected.size, actual.size);
  }
  // Each actual member matches at most one expected member
  const candidates = [...actual];
  const consumed = new Array<boolean>(candidates.length).fill(false);
  for (const member of expected) {
    let match = candidates.findIndex((candidate, j) => !consumed[j] && candidate === member);
    if (match === -1) {
      match = candidates.findIndex(
        (candidate, j) => !consumed[j] && compare(member, candidate, path, seen) === null,
      );
    }
    if (match !== -1) {
      consumed[match] = true;
      continue;
    }
    return {
      path,
      code: MismatchCode.MISSING_MEMBER,
      message: `Member ${preview(member)} is missing`,
      expected: preview(member),
    };
  }
  return null;
}

function compareMappings(
  expected: ReadonlyMap<unknown, unknown>,
  actual: ReadonlyMap<unknown, unknown>,
  path: string,
  seen: Seen,
): Mismatch | null {
  if (expected.size !== actual.size) {
    return lengthMismatch(path, expected.size, actual.size);
  }
  for (const [key, value] of expected) {
    const keyPath = appendPath(path, typeof key === 'string' ? key : preview(key));
    if (!actual.has(key)) {
      return {
        path: keyPath,
        code: MismatchCode.MISSING_KEY,
        message: `Key ${preview(key)} is missing`,
        expected: preview(key),
      };
    }
    const result = compare(value, actual.get(key), keyPath, seen);
    if (result) return result;
  }
  return null;
}

function compareComposites(
  expected: object,
  actual: object,
  path: string,
  seen: Seen,
): Mismatch | null {
  const expectedFields = new Map(fieldsOf(expected).map((field) => [field.name, field.value]));
  const actualFields = new Map(fieldsOf(actual).map((field) => [field.name, field.value]));
  const names = new Set([...expectedFields.keys(), ...actualFields.keys()]);

  // A field missing on one side reads as nil
  for (const name of names) {
    const result = compare(
      expectedFields.get(name),
      actualFields.get(name),
      appendPath(path, name),
      seen,
    );
    if (result) return result;
  }
  return null;
}

function compareSameShape(
  left: Inspected,
  right: Inspected,
  path: string,
  seen: Seen,
): Mismatch | null {
  switch (left.shape) {
    case 'numeric':
      if (right.shape !== 'numeric') break;
      return numericEquals(left.value, right.value)
        ? null
        : valueMismatch(path, left.value, right.value);
    case 'sequence': {
      if (right.shape !== 'sequence') break;
      const expected = left.value;
      const actual = right.value;
      return guarded(seen, expected, actual, () =>
        compareSequences(elementsOf(expected), elementsOf(actual), path, seen),
      );
    }
    case 'set': {
      if (right.shape !== 'set') break;
      const expected = left.value;
      const actual = right.value;
      return guarded(seen, expected, actual, () => compareSets(expected, actual, path, seen));
    }
    case 'mapping': {
      if (right.shape !== 'mapping') break;
      const expected = left.value;
      const actual = right.value;
      return guarded(seen, expected, actual, () => compareMappings(expected, actual, path, seen));
    }
    case 'reference': {
      if (right.shape !== 'reference') break;
      const expected = left.value;
      const actual = right.value;
      if (expected.isNil || actual.isNil) {
        return expected.isNil && actual.isNil ? null : nilMismatch(path, expected, actual);
      }
      return guarded(seen, expected, actual, () =>
        compare(expected.target, actual.target, path, seen),
      );
    }
    case 'composite': {
      if (right.shape !== 'composite') break;
      const expected = left.value;
      const actual = right.value;
      return guarded(seen, expected, actual, () =>
        compareComposites(expected, actual, path, seen),
      );
    }
    default:
      // booleans, text, callables, channels and symbols compare by identity
      return left.value === right.value ? null : valueMismatch(path, left.value, right.value);
  }
  return typeMismatch(path, left.value, right.value);
}

function compare(expected: unknown, actual: unknown, path: string, seen: Seen): Mismatch | null {
  const left = inspect(expected);
  const right = inspect(actual);

  // nil only equals nil
  if (left.shape === 'nil' || right.shape === 'nil') {
    return left.shape === right.shape ? null : nilMismatch(path, expected, actual);
  }

  if (left.shape === 'bytes') {
    return right.shape === 'bytes'
      ? compareBytes(left.value, right.value, path)
      : typeMismatch(path, expected, actual);
  }

  if (left.shape !== right.shape || typeKey(left) !== typeKey(right)) {
    return typeMismatch(path, expected, actual);
  }

  return compareSameShape(left, right, path, seen);
}

/**
 * First difference between two values, or null when they are deeply equal.
 *
 * @example
 * ```ts
 * findMismatch({ user: { name: 'Ada' } }, { user: { name: 'Bob' } })
 * // => { path: '/user/name', code: 'VALUE_MISMATCH', ... }
 * ```
 */
export function findMismatch(expected: unknown, actual: unknown): Mismatch | null {
  return compare(expected, actual, '', new Map());
}

/**
 * Deep structural equality without type coercion.
 *
 * Byte sequences compare byte for byte; a nil byte sequence only equals nil.
 */
export function equal(expected: unknown, actual: unknown): boolean {
  return findMismatch(expected, actual) === null;
}
