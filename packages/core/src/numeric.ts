/**
 * Sized numeric values
 *
 * JavaScript only has float64 numbers and arbitrary-size bigints, so widths
 * are carried explicitly. Integer types store a bigint already wrapped into
 * range, float types a number (rounded to single precision for float32), and
 * complex types a { re, im } pair.
 */

import { CompareRangeError } from './errors.js';
import type { Complex, NumericType, NumericValue, TypedNumberArray } from './types.js';

type IntegerLayout = { bits: number; signed: boolean };

const INTEGER_LAYOUTS: Partial<Record<NumericType, IntegerLayout>> = {
  int8: { bits: 8, signed: true },
  int16: { bits: 16, signed: true },
  int32: { bits: 32, signed: true },
  int64: { bits: 64, signed: true },
  int: { bits: 64, signed: true },
  uint8: { bits: 8, signed: false },
  uint16: { bits: 16, signed: false },
  uint32: { bits: 32, signed: false },
  uint64: { bits: 64, signed: false },
  uint: { bits: 64, signed: false },
};

/** Storage size in bytes, used to pick the widening direction */
export const NUMERIC_SIZES: Record<NumericType, number> = {
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  float32: 4,
  int64: 8,
  uint64: 8,
  int: 8,
  uint: 8,
  float64: 8,
  complex64: 8,
  complex128: 16,
};

export class Numeric {
  constructor(
    readonly type: NumericType,
    readonly value: NumericValue,
  ) {}

  toString(): string {
    if (isComplexValue(this.value)) {
      const sign = this.value.im < 0 ? '-' : '+';
      return `${this.type}(${this.value.re}${sign}${Math.abs(this.value.im)}i)`;
    }
    return `${this.type}(${this.value})`;
  }
}

export function isIntegerType(type: NumericType): boolean {
  return INTEGER_LAYOUTS[type] !== undefined;
}

export function isFloatType(type: NumericType): boolean {
  return type === 'float32' || type === 'float64';
}

export function isComplexType(type: NumericType): boolean {
  return type === 'complex64' || type === 'complex128';
}

function isComplexValue(value: NumericValue): value is Complex {
  return typeof value === 'object';
}

function wrapInteger(value: bigint, layout: IntegerLayout): bigint {
  return layout.signed ? BigInt.asIntN(layout.bits, value) : BigInt.asUintN(layout.bits, value);
}

function inIntegerRange(value: bigint, layout: IntegerLayout): boolean {
  return wrapInteger(value, layout) === value;
}

function roundFloat(value: number, type: NumericType): number {
  return type === 'float32' ? Math.fround(value) : value;
}

function integer(type: NumericType, input: number | bigint): Numeric {
  const layout = INTEGER_LAYOUTS[type];
  if (!layout) {
    throw new CompareRangeError(`'${type}' is not an integer type`);
  }
  if (typeof input === 'number' && !Number.isFinite(input)) {
    throw new CompareRangeError(`Cannot represent ${input} as ${type}`);
  }
  const whole = typeof input === 'bigint' ? input : BigInt(Math.trunc(input));
  return new Numeric(type, wrapInteger(whole, layout));
}

function float(type: NumericType, input: number | bigint): Numeric {
  return new Numeric(type, roundFloat(Number(input), type));
}

function complex(type: NumericType, re: number, im: number): Numeric {
  const part = type === 'complex64' ? Math.fround : (n: number) => n;
  return new Numeric(type, { re: part(re), im: part(im) });
}

export const int8 = (input: number | bigint): Numeric => integer('int8', input);
export const int16 = (input: number | bigint): Numeric => integer('int16', input);
export const int32 = (input: number | bigint): Numeric => integer('int32', input);
export const int64 = (input: number | bigint): Numeric => integer('int64', input);
export const int = (input: number | bigint): Numeric => integer('int', input);
export const uint8 = (input: number | bigint): Numeric => integer('uint8', input);
export const uint16 = (input: number | bigint): Numeric => integer('uint16', input);
export const uint32 = (input: number | bigint): Numeric => integer('uint32', input);
export const uint64 = (input: number | bigint): Numeric => integer('uint64', input);
export const uint = (input: number | bigint): Numeric => integer('uint', input);
export const float32 = (input: number | bigint): Numeric => float('float32', input);
export const float64 = (input: number | bigint): Numeric => float('float64', input);
export const complex64 = (re: number, im = 0): Numeric => complex('complex64', re, im);
export const complex128 = (re: number, im = 0): Numeric => complex('complex128', re, im);

/**
 * Normalize a native number or bigint into a Numeric.
 * A plain number is a float64, a plain bigint an int64.
 */
export function toNumeric(value: number | bigint | Numeric): Numeric {
  if (value instanceof Numeric) return value;
  if (typeof value === 'bigint') return new Numeric('int64', value);
  return new Numeric('float64', value);
}

/**
 * Whether a value of type `from` may be converted to type `to`.
 * Complex values only convert to and from other complex types.
 */
export function canConvertNumeric(from: NumericType, to: NumericType): boolean {
  return isComplexType(from) === isComplexType(to);
}

/**
 * Convert a Numeric to another numeric type.
 *
 * Integer to integer wraps like a two's-complement conversion. Float to
 * integer truncates toward zero; non-finite or out-of-range floats have no
 * integer representation and yield undefined.
 */
export function convertNumeric(source: Numeric, to: NumericType): Numeric | undefined {
  if (source.type === to) return source;
  if (!canConvertNumeric(source.type, to)) return undefined;

  const value = source.value;

  if (isComplexValue(value)) {
    return complex(to, value.re, value.im);
  }

  const layout = INTEGER_LAYOUTS[to];
  if (!layout) {
    return float(to, value);
  }

  if (typeof value === 'bigint') {
    return new Numeric(to, wrapInteger(value, layout));
  }

  if (!Number.isFinite(value)) return undefined;
  const whole = BigInt(Math.trunc(value));
  if (!inIntegerRange(whole, layout)) return undefined;
  return new Numeric(to, whole);
}

/** Native equality of two numerics of the same type */
export function numericEquals(a: Numeric, b: Numeric): boolean {
  if (a.type !== b.type) return false;
  const left = a.value;
  const right = b.value;
  if (isComplexValue(left) || isComplexValue(right)) {
    return (
      isComplexValue(left) && isComplexValue(right) && left.re === right.re && left.im === right.im
    );
  }
  return left === right;
}

export function isZeroNumeric(value: Numeric): boolean {
  const raw = value.value;
  if (isComplexValue(raw)) return raw.re === 0 && raw.im === 0;
  return typeof raw === 'bigint' ? raw === 0n : raw === 0;
}

/** Element type of a typed numeric array */
export function elementType(array: TypedNumberArray | Uint8Array): NumericType {
  if (array instanceof Int8Array) return 'int8';
  if (array instanceof Uint8Array || array instanceof Uint8ClampedArray) return 'uint8';
  if (array instanceof Int16Array) return 'int16';
  if (array instanceof Uint16Array) return 'uint16';
  if (array instanceof Int32Array) return 'int32';
  if (array instanceof Uint32Array) return 'uint32';
  if (array instanceof Float32Array) return 'float32';
  if (array instanceof BigInt64Array) return 'int64';
  if (array instanceof BigUint64Array) return 'uint64';
  return 'float64';
}

export function isTypedNumberArray(value: unknown): value is TypedNumberArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView) && !(value instanceof Uint8Array);
}
