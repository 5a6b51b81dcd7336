import { createLogger, type LogEntry } from '@fixturekit/logger';
import { createMockLogger } from '@fixturekit/logger/mock';
import { describe, expect, it } from 'vitest';
import { Comparator, createComparator } from '../src/comparator.js';
import { CompareTypeError } from '../src/errors.js';
import { defaultRegistry, CompositeRegistry } from '../src/registry.js';
import { MismatchCode } from '../src/types.js';

class Account {
  constructor(
    public id: string,
    public secret: string,
  ) {}
}

function setup(environment: 'test' | 'production' = 'test') {
  const entries: LogEntry[] = [];
  const logger = createLogger({ environment, sink: (entry) => entries.push(entry) });
  const registry = new CompositeRegistry();
  registry.register(Account, { exported: ['id'] });
  return { entries, comparator: createComparator({ logger, registry }) };
}

describe('Comparator', () => {
  it('should default to the shared registry', () => {
    const comparator = createComparator();
    expect(comparator).toBeInstanceOf(Comparator);
    expect(comparator.registry).toBe(defaultRegistry);
  });

  it('should work without a logger', () => {
    const comparator = createComparator();
    expect(comparator.equal(1, 2)).toBe(false);
    expect(comparator.diffLists([1], [2])).toEqual({ extraA: [1], extraB: [2] });
  });

  it('should create a child logger for its events', () => {
    const logger = createMockLogger();
    createComparator({ logger });

    expect(logger.child).toHaveBeenCalledWith({ component: 'comparator' });
  });

  it('should log failed comparisons', () => {
    const { entries, comparator } = setup();

    expect(comparator.equal({ a: 1 }, { a: 2 })).toBe(false);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('debug');
    expect(entries[0]?.event_type).toBe('mismatch_found');
    expect(entries[0]?.metadata).toEqual({
      component: 'comparator',
      operation: 'equal',
      path: '/a',
      code: MismatchCode.VALUE_MISMATCH,
      message: 'Expected float64(1), got float64(2)',
    });
  });

  it('should not log successful comparisons', () => {
    const { entries, comparator } = setup();

    expect(comparator.equal([1], [1])).toBe(true);
    expect(comparator.equalValues(1, 1n)).toBe(true);
    expect(comparator.elementsMatch([1, 2], [2, 1])).toBeNull();
    expect(comparator.findMismatch('a', 'a')).toBeNull();

    expect(entries).toHaveLength(0);
  });

  it('should log failed numeric comparisons', () => {
    const { entries, comparator } = setup();

    expect(comparator.equalValues(1, 'one')).toBe(false);

    expect(entries[0]?.metadata).toMatchObject({
      operation: 'equalValues',
      code: MismatchCode.TYPE_MISMATCH,
      message: 'Expected float64, got string',
    });
  });

  it('should log exact comparisons that fail on type alone', () => {
    const { entries, comparator } = setup();

    expect(comparator.exactly(new Uint8Array([1]), Buffer.from([1]))).toBe(false);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.event_type).toBe('mismatch_found');
    expect(entries[0]?.metadata).toEqual({
      component: 'comparator',
      operation: 'exactly',
      path: '',
      code: MismatchCode.TYPE_MISMATCH,
      message: 'Types expected to match exactly: Uint8Array != Buffer',
    });
  });

  it('should log list diffs', () => {
    const { entries, comparator } = setup();

    expect(comparator.diffLists([1, 2, 2, 3], [2, 3, 3, 4])).toEqual({
      extraA: [1, 2],
      extraB: [3, 4],
    });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.event_type).toBe('list_diffed');
    expect(entries[0]?.metadata).toEqual({ component: 'comparator', extra_a: 2, extra_b: 2 });
  });

  it('should propagate list errors without logging', () => {
    const { entries, comparator } = setup();

    expect(() => comparator.diffLists('abc', [])).toThrow(CompareTypeError);
    expect(entries).toHaveLength(0);
  });

  it('should log mismatched elements', () => {
    const { entries, comparator } = setup();

    comparator.elementsMatch([1], [2]);

    expect(entries[0]?.metadata).toMatchObject({
      operation: 'elementsMatch',
      path: '',
      code: MismatchCode.EXTRA_ELEMENTS,
    });
  });

  it('should use its registry for exported fields', () => {
    const { entries, comparator } = setup();

    expect(comparator.checkExportedValues(new Account('a', 'x'), new Account('a', 'y'))).toBeNull();
    expect(comparator.copyExported(new Account('a', 'x'))).toEqual({ id: 'a' });
    expect(comparator.checkExportedValues(new Account('a', 'x'), new Account('b', 'x'))?.path).toBe(
      '/id',
    );

    expect(entries.map((entry) => entry.metadata.operation)).toEqual(['checkExportedValues']);
  });

  it('should respect the logger level', () => {
    const { entries, comparator } = setup('production');

    comparator.equal(1, 2);

    expect(entries).toHaveLength(0);
  });

  it('should expose the classifiers', () => {
    const comparator = createComparator();

    expect(comparator.isEmpty([])).toBe(true);
    expect(comparator.isNil(null)).toBe(true);
    expect(comparator.isList(new Uint8Array(1))).toBe(true);
    expect(comparator.lengthOf('abc')).toBe(3);
    expect(comparator.sameType(1, 2)).toBe(true);
    expect(comparator.typeName(new Account('a', 'b'))).toBe('Account');
    expect(comparator.exactly(1, 1)).toBe(true);
    expect(comparator.contains([1, 2], 2)).toBe('found');
  });
});
