import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { isEmpty, isZero } from '../src/empty.js';
import { complex64, float32, int8, uint16 } from '../src/numeric.js';
import { nilRef, ref } from '../src/reference.js';

class Settings {
  name = '';
  retries = 0;
  verbose = false;
  parent: Settings | null = null;
}

describe('isEmpty', () => {
  it('should treat nil as empty', () => {
    expect(isEmpty(null)).toBe(true);
    expect(isEmpty(undefined)).toBe(true);
  });

  it('should check collection counts', () => {
    expect(isEmpty([])).toBe(true);
    expect(isEmpty([0])).toBe(false);
    expect(isEmpty(new Uint8Array(0))).toBe(true);
    expect(isEmpty(new Uint8Array(1))).toBe(false);
    expect(isEmpty(new Int32Array(0))).toBe(true);
    expect(isEmpty(new Set())).toBe(true);
    expect(isEmpty(new Set([null]))).toBe(false);
    expect(isEmpty(new Map())).toBe(true);
    expect(isEmpty(new Map([['k', 0]]))).toBe(false);
  });

  it('should check buffered channel data', () => {
    const stream = new PassThrough();
    expect(isEmpty(stream)).toBe(true);
    stream.write('x');
    expect(isEmpty(stream)).toBe(false);
  });

  it('should treat zero values as empty', () => {
    expect(isEmpty(0)).toBe(true);
    expect(isEmpty(0n)).toBe(true);
    expect(isEmpty(-0)).toBe(true);
    expect(isEmpty(int8(0))).toBe(true);
    expect(isEmpty(complex64(0))).toBe(true);
    expect(isEmpty('')).toBe(true);
    expect(isEmpty(false)).toBe(true);
  });

  it('should treat non-zero values as not empty', () => {
    expect(isEmpty(1)).toBe(false);
    expect(isEmpty(Number.NaN)).toBe(false);
    expect(isEmpty(float32(0.5))).toBe(false);
    expect(isEmpty(uint16(1))).toBe(false);
    expect(isEmpty(' ')).toBe(false);
    expect(isEmpty(true)).toBe(false);
  });

  it('should treat composites of zero fields as empty', () => {
    expect(isEmpty(new Settings())).toBe(true);
    expect(isEmpty({})).toBe(true);
    expect(isEmpty({ a: null, b: undefined })).toBe(true);
  });

  it('should treat composites with a non-zero field as not empty', () => {
    const settings = new Settings();
    settings.retries = 3;
    expect(isEmpty(settings)).toBe(false);
  });

  it('should not treat empty collections inside composites as zero', () => {
    expect(isEmpty({ items: [] })).toBe(false);
    expect(isEmpty({ lookup: new Map() })).toBe(false);
  });

  it('should treat nested zero composites as zero', () => {
    expect(isEmpty({ inner: { count: 0 } })).toBe(true);
    expect(isEmpty({ inner: { count: 1 } })).toBe(false);
  });

  it('should check built-in composites by their fields', () => {
    expect(isEmpty(new Date(0))).toBe(true);
    expect(isEmpty(new Date(1))).toBe(false);
  });

  it('should check boxed primitives by their value', () => {
    expect(isEmpty(new Number(0))).toBe(true);
    expect(isEmpty(new Number(5))).toBe(false);
    expect(isEmpty(new Boolean(false))).toBe(true);
    expect(isEmpty(new String(''))).toBe(true);
    expect(isEmpty(new String('a'))).toBe(false);
  });

  it('should never treat callables or symbols as empty', () => {
    expect(isEmpty(() => undefined)).toBe(false);
    expect(isEmpty(Symbol('x'))).toBe(false);
  });

  it('should follow references to their target', () => {
    expect(isEmpty(nilRef())).toBe(true);
    expect(isEmpty(ref(0))).toBe(true);
    expect(isEmpty(ref(ref('')))).toBe(true);
    expect(isEmpty(ref([]))).toBe(true);
    expect(isEmpty(ref(new Settings()))).toBe(true);
    expect(isEmpty(ref(1))).toBe(false);
  });

  it('should terminate on cyclic composites', () => {
    const settings = new Settings();
    settings.parent = settings;
    expect(isEmpty(settings)).toBe(true);

    settings.verbose = true;
    expect(isEmpty(settings)).toBe(false);
  });
});

describe('isZero', () => {
  it('should treat only nil as the zero collection', () => {
    expect(isZero(null)).toBe(true);
    expect(isZero([])).toBe(false);
    expect(isZero(nilRef())).toBe(false);
    expect(isZero(new Set())).toBe(false);
  });
});
