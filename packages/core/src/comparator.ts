import type { Logger } from '@fixturekit/logger';
import { checkExportedValues, contains, elementsMatch, exactMismatch } from './checks.js';
import { diffLists } from './diff.js';
import { isEmpty } from './empty.js';
import { equal, findMismatch } from './equal.js';
import { equalValues } from './equal-values.js';
import { copyExported } from './exported.js';
import { isNil } from './nil.js';
import { type CompositeRegistry, defaultRegistry } from './registry.js';
import { isList, lengthOf, sameType, typeName } from './shape.js';
import type { ContainsResult, DiffResult, Mismatch } from './types.js';

export interface ComparatorOptions {
  /** Field visibility declarations (default: the shared default registry) */
  registry?: CompositeRegistry;
  /** Receives debug events for failed comparisons */
  logger?: Logger;
}

/**
 * Comparison operations bound to one registry and logger.
 */
export class Comparator {
  readonly registry: CompositeRegistry;
  private logger?: Logger;

  constructor(options: ComparatorOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.logger = options.logger?.child({ component: 'comparator' });
  }

  isEmpty(value: unknown): boolean {
    return isEmpty(value);
  }

  isNil(value: unknown): boolean {
    return isNil(value);
  }

  isList(value: unknown): boolean {
    return isList(value);
  }

  lengthOf(value: unknown): number | undefined {
    return lengthOf(value);
  }

  sameType(a: unknown, b: unknown): boolean {
    return sameType(a, b);
  }

  typeName(value: unknown): string {
    return typeName(value);
  }

  equal(expected: unknown, actual: unknown): boolean {
    if (equal(expected, actual)) return true;
    this.report('equal', findMismatch(expected, actual));
    return false;
  }

  findMismatch(expected: unknown, actual: unknown): Mismatch | null {
    const mismatch = findMismatch(expected, actual);
    this.report('findMismatch', mismatch);
    return mismatch;
  }

  equalValues(expected: unknown, actual: unknown): boolean {
    if (equalValues(expected, actual)) return true;
    this.report('equalValues', findMismatch(expected, actual));
    return false;
  }

  exactly(expected: unknown, actual: unknown): boolean {
    const mismatch = exactMismatch(expected, actual);
    this.report('exactly', mismatch);
    return mismatch === null;
  }

  copyExported(value: unknown): unknown {
    return copyExported(value, this.registry);
  }

  diffLists(listA: unknown, listB: unknown): DiffResult {
    const result = diffLists(listA, listB);
    this.logger?.debug('list_diffed', {
      extra_a: result.extraA.length,
      extra_b: result.extraB.length,
    });
    return result;
  }

  contains(container: unknown, element: unknown): ContainsResult {
    return contains(container, element);
  }

  elementsMatch(listA: unknown, listB: unknown): Mismatch | null {
    const mismatch = elementsMatch(listA, listB);
    this.report('elementsMatch', mismatch);
    return mismatch;
  }

  checkExportedValues(expected: unknown, actual: unknown): Mismatch | null {
    const mismatch = checkExportedValues(expected, actual, this.registry);
    this.report('checkExportedValues', mismatch);
    return mismatch;
  }

  private report(operation: string, mismatch: Mismatch | null): void {
    if (!mismatch || !this.logger) return;
    this.logger.debug('mismatch_found', {
      operation,
      path: mismatch.path,
      code: mismatch.code,
      message: mismatch.message,
    });
  }
}

export function createComparator(options: ComparatorOptions = {}): Comparator {
  return new Comparator(options);
}
