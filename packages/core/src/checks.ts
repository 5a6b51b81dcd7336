/**
 * Assertion checks
 *
 * Structured verdicts for the assertion layer. Each check returns null on
 * success or the Mismatch to report; wording the final failure message is
 * left to the caller.
 */

import { diffLists } from './diff.js';
import { isEmpty } from './empty.js';
import { equal, findMismatch } from './equal.js';
import { equalValues } from './equal-values.js';
import { isNil } from './nil.js';
import { copyExported } from './exported.js';
import { type CompositeRegistry, defaultRegistry } from './registry.js';
import { elementsOf, inspect, isList, sameType, typeName } from './shape.js';
import { type ContainsResult, type Mismatch, MismatchCode } from './types.js';

function typesDiffer(expected: unknown, actual: unknown): Mismatch {
  return {
    path: '',
    code: MismatchCode.TYPE_MISMATCH,
    message: `Types expected to match exactly: ${typeName(expected)} != ${typeName(actual)}`,
    expected: typeName(expected),
    actual: typeName(actual),
  };
}

/** Same type and deeply equal */
export function exactly(expected: unknown, actual: unknown): boolean {
  return sameType(expected, actual) && equal(expected, actual);
}

/** Why exactly() fails, or null when it holds */
export function exactMismatch(expected: unknown, actual: unknown): Mismatch | null {
  return sameType(expected, actual) ? findMismatch(expected, actual) : typesDiffer(expected, actual);
}

/**
 * Whether `container` holds `element`: a substring of text, a key of a map,
 * a member of a set or an element of a list.
 */
export function contains(container: unknown, element: unknown): ContainsResult {
  const inspected = inspect(container);
  switch (inspected.shape) {
    case 'text':
      if (typeof element !== 'string') return 'unsupported';
      return inspected.value.includes(element) ? 'found' : 'missing';
    case 'mapping':
      for (const key of inspected.value.keys()) {
        if (equal(key, element)) return 'found';
      }
      return 'missing';
    case 'set':
      for (const member of inspected.value) {
        if (equal(member, element)) return 'found';
      }
      return 'missing';
    case 'sequence':
    case 'bytes':
      return elementsOf(inspected.value).some((candidate) => equal(candidate, element))
        ? 'found'
        : 'missing';
    default:
      return 'unsupported';
  }
}

function unsupportedList(path: string, value: unknown): Mismatch {
  return {
    path,
    code: MismatchCode.UNSUPPORTED_TYPE,
    message: `Unsupported type ${typeName(value)}, expecting a list`,
    expected: 'list',
    actual: typeName(value),
  };
}

/**
 * Lists hold the same elements, in any order, with the same multiplicity.
 * Two empty values always match.
 */
export function elementsMatch(listA: unknown, listB: unknown): Mismatch | null {
  if (isEmpty(listA) && isEmpty(listB)) return null;
  if (!isList(listA)) return unsupportedList('/listA', listA);
  if (!isList(listB)) return unsupportedList('/listB', listB);

  const { extraA, extraB } = diffLists(listA, listB);
  if (extraA.length === 0 && extraB.length === 0) return null;

  return {
    path: '',
    code: MismatchCode.EXTRA_ELEMENTS,
    message: `Lists are not equal, ${extraA.length} extra in first, ${extraB.length} extra in second`,
    extraA,
    extraB,
  };
}

function dereference(value: unknown): unknown {
  const inspected = inspect(value);
  return inspected.shape === 'reference' ? inspected.value.target : value;
}

/**
 * Compare only the exported fields of two composites (or references to
 * composites) of exactly the same type. Nil references pass the composite
 * check and only equal each other.
 */
export function checkExportedValues(
  expected: unknown,
  actual: unknown,
  registry: CompositeRegistry = defaultRegistry,
): Mismatch | null {
  if (!sameType(expected, actual)) {
    return typesDiffer(expected, actual);
  }

  for (const value of [expected, actual]) {
    // A nil reference copies to itself
    if (isNil(value) && inspect(value).shape === 'reference') continue;
    const target = dereference(value);
    if (inspect(target).shape !== 'composite') {
      return {
        path: '',
        code: MismatchCode.UNSUPPORTED_TYPE,
        message: `Types expected to be composites or references to composites, got ${typeName(value)}`,
        expected: 'composite',
        actual: typeName(value),
      };
    }
  }

  const expectedCopy = copyExported(expected, registry);
  const actualCopy = copyExported(actual, registry);
  if (equalValues(expectedCopy, actualCopy)) return null;

  return (
    findMismatch(expectedCopy, actualCopy) ?? {
      path: '',
      code: MismatchCode.VALUE_MISMATCH,
      message: 'Not equal (comparing only exported fields)',
    }
  );
}
