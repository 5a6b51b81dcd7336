// Core value model for structural comparison

import type { Numeric } from './numeric.js';
import type { Ref } from './reference.js';

export type NumericType =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'int'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'uint'
  | 'float32'
  | 'float64'
  | 'complex64'
  | 'complex128';

export type Complex = {
  re: number;
  im: number;
};

// Integers hold bigint, floats hold number, complex types hold Complex
export type NumericValue = bigint | number | Complex;

export type TypedNumberArray =
  | Int8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export type Sequence = readonly unknown[] | TypedNumberArray;

// Buffered reader such as a Node.js Readable
export type ChannelLike = {
  readonly readableLength: number;
  read(size?: number): unknown;
};

export type Shape =
  | 'nil'
  | 'boolean'
  | 'numeric'
  | 'text'
  | 'bytes'
  | 'sequence'
  | 'set'
  | 'mapping'
  | 'reference'
  | 'composite'
  | 'callable'
  | 'channel'
  | 'symbol';

// Result of inspect(): one variant per shape
export type Inspected =
  | { shape: 'nil'; value: null | undefined }
  | { shape: 'boolean'; value: boolean }
  | { shape: 'numeric'; value: Numeric }
  | { shape: 'text'; value: string }
  | { shape: 'bytes'; value: Uint8Array }
  | { shape: 'sequence'; value: Sequence }
  | { shape: 'set'; value: ReadonlySet<unknown> }
  | { shape: 'mapping'; value: ReadonlyMap<unknown, unknown> }
  | { shape: 'reference'; value: Ref<unknown> }
  | { shape: 'composite'; value: object }
  | { shape: 'callable'; value: (...args: never[]) => unknown }
  | { shape: 'channel'; value: ChannelLike }
  | { shape: 'symbol'; value: symbol };

export type FieldDescriptor = {
  name: string;
  exported: boolean;
  value: unknown;
};

// Per-type declaration of which fields take part in exported-only comparison
export type CompositeDefinition = {
  exported: readonly string[];
  description?: string;
};

export type DiffResult = {
  extraA: unknown[];
  extraB: unknown[];
};

// First difference found between two values
export type Mismatch = {
  path: string; // JSON Pointer (e.g., "/users/0/name")
  code: MismatchCode;
  message: string;
  expected?: string; // Expected type/value
  actual?: string; // Actual type/value
  extraA?: unknown[];
  extraB?: unknown[];
};

export enum MismatchCode {
  NIL_MISMATCH = 'NIL_MISMATCH',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  VALUE_MISMATCH = 'VALUE_MISMATCH',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  MISSING_KEY = 'MISSING_KEY',
  MISSING_MEMBER = 'MISSING_MEMBER',
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  EXTRA_ELEMENTS = 'EXTRA_ELEMENTS',
}

export type ContainsResult = 'found' | 'missing' | 'unsupported';
