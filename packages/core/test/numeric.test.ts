import { describe, expect, it } from 'vitest';
import { CompareRangeError } from '../src/errors.js';
import {
  Numeric,
  complex64,
  complex128,
  convertNumeric,
  elementType,
  float32,
  float64,
  int8,
  int16,
  int64,
  isTypedNumberArray,
  isZeroNumeric,
  numericEquals,
  toNumeric,
  uint8,
  uint16,
  uint64,
} from '../src/numeric.js';

describe('numeric constructors', () => {
  it('should store integers as bigint', () => {
    expect(int16(300).value).toBe(300n);
    expect(int16(300).type).toBe('int16');
  });

  it('should wrap out-of-range integers', () => {
    expect(int8(200).value).toBe(-56n);
    expect(uint8(-1).value).toBe(255n);
    expect(uint16(65536).value).toBe(0n);
    expect(uint64(-1n).value).toBe(18446744073709551615n);
  });

  it('should truncate fractional input', () => {
    expect(int8(3.9).value).toBe(3n);
    expect(int8(-3.9).value).toBe(-3n);
  });

  it('should throw for non-finite integer input', () => {
    expect(() => int8(Number.NaN)).toThrow(CompareRangeError);
    expect(() => int64(Number.POSITIVE_INFINITY)).toThrow('Cannot represent Infinity as int64');
  });

  it('should round float32 to single precision', () => {
    expect(float32(0.1).value).toBe(Math.fround(0.1));
    expect(float64(0.1).value).toBe(0.1);
  });

  it('should build complex values', () => {
    expect(complex128(1, 2).value).toEqual({ re: 1, im: 2 });
    expect(complex64(3).value).toEqual({ re: 3, im: 0 });
  });

  it('should print type and value', () => {
    expect(String(uint8(7))).toBe('uint8(7)');
    expect(String(float64(1.5))).toBe('float64(1.5)');
    expect(String(complex128(1, 2))).toBe('complex128(1+2i)');
  });
});

describe('toNumeric', () => {
  it('should treat numbers as float64 and bigints as int64', () => {
    expect(toNumeric(5)).toEqual(new Numeric('float64', 5));
    expect(toNumeric(5n)).toEqual(new Numeric('int64', 5n));
  });

  it('should pass Numeric values through', () => {
    const value = int8(1);
    expect(toNumeric(value)).toBe(value);
  });
});

describe('convertNumeric', () => {
  it('should wrap integer to integer conversions', () => {
    expect(convertNumeric(uint8(255), 'int8')).toEqual(int8(-1));
    expect(convertNumeric(int8(-1), 'uint8')).toEqual(uint8(255));
    expect(convertNumeric(int16(300), 'int8')).toEqual(int8(44));
  });

  it('should convert integers to floats', () => {
    expect(convertNumeric(int8(5), 'float64')).toEqual(float64(5));
  });

  it('should truncate floats converted to integers', () => {
    expect(convertNumeric(float64(2.7), 'int16')).toEqual(int16(2));
    expect(convertNumeric(float64(-2.7), 'int16')).toEqual(int16(-2));
  });

  it('should give undefined for floats with no integer form', () => {
    expect(convertNumeric(float64(Number.NaN), 'int32')).toBeUndefined();
    expect(convertNumeric(float64(Number.POSITIVE_INFINITY), 'int64')).toBeUndefined();
    expect(convertNumeric(float64(300), 'int8')).toBeUndefined();
    expect(convertNumeric(float64(-1), 'uint8')).toBeUndefined();
  });

  it('should only convert complex to complex', () => {
    expect(convertNumeric(complex128(1, 2), 'float64')).toBeUndefined();
    expect(convertNumeric(float64(1), 'complex128')).toBeUndefined();
    expect(convertNumeric(complex64(1, 2), 'complex128')).toEqual(complex128(1, 2));
  });

  it('should return the same value for the same type', () => {
    const value = int16(9);
    expect(convertNumeric(value, 'int16')).toBe(value);
  });
});

describe('numericEquals', () => {
  it('should require the same type', () => {
    expect(numericEquals(int8(1), int8(1))).toBe(true);
    expect(numericEquals(int8(1), int16(1))).toBe(false);
  });

  it('should follow IEEE equality', () => {
    expect(numericEquals(float64(Number.NaN), float64(Number.NaN))).toBe(false);
    expect(numericEquals(float64(-0), float64(0))).toBe(true);
  });

  it('should compare complex parts', () => {
    expect(numericEquals(complex128(1, 2), complex128(1, 2))).toBe(true);
    expect(numericEquals(complex128(1, 2), complex128(1, 3))).toBe(false);
  });
});

describe('isZeroNumeric', () => {
  it('should detect zero of every kind', () => {
    expect(isZeroNumeric(int8(0))).toBe(true);
    expect(isZeroNumeric(float64(-0))).toBe(true);
    expect(isZeroNumeric(complex64(0, 0))).toBe(true);
    expect(isZeroNumeric(complex64(0, 1))).toBe(false);
    expect(isZeroNumeric(uint8(256))).toBe(true);
  });
});

describe('typed arrays', () => {
  it('should map arrays to element types', () => {
    expect(elementType(new Int16Array(1))).toBe('int16');
    expect(elementType(new Uint8Array(1))).toBe('uint8');
    expect(elementType(new Uint8ClampedArray(1))).toBe('uint8');
    expect(elementType(new Float32Array(1))).toBe('float32');
    expect(elementType(new BigInt64Array(1))).toBe('int64');
    expect(elementType(new Float64Array(1))).toBe('float64');
  });

  it('should exclude byte arrays and DataView', () => {
    expect(isTypedNumberArray(new Int32Array(2))).toBe(true);
    expect(isTypedNumberArray(new Uint8Array(2))).toBe(false);
    expect(isTypedNumberArray(new DataView(new ArrayBuffer(2)))).toBe(false);
    expect(isTypedNumberArray([1, 2])).toBe(false);
  });
});
