/**
 * Runtime shape inspection
 *
 * Every algorithm in this package dispatches on inspect(value), a closed
 * union of shapes, instead of probing values ad hoc.
 */

import { Numeric, elementType, isIntegerType, isTypedNumberArray } from './numeric.js';
import { Ref } from './reference.js';
import { type CompositeRegistry, defaultRegistry } from './registry.js';
import type { ChannelLike, FieldDescriptor, Inspected, Sequence } from './types.js';

function isCallable(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

export function isChannelLike(value: unknown): value is ChannelLike {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'readableLength' in value &&
    typeof value.readableLength === 'number' &&
    'read' in value &&
    typeof value.read === 'function'
  );
}

export function inspect(value: unknown): Inspected {
  if (value === null || value === undefined) return { shape: 'nil', value };
  if (typeof value === 'boolean') return { shape: 'boolean', value };
  if (typeof value === 'number' || typeof value === 'bigint') {
    return { shape: 'numeric', value: toNumericValue(value) };
  }
  if (typeof value === 'string') return { shape: 'text', value };
  if (typeof value === 'symbol') return { shape: 'symbol', value };
  if (isCallable(value)) return { shape: 'callable', value };
  if (value instanceof Numeric) return { shape: 'numeric', value };
  if (value instanceof Uint8Array) return { shape: 'bytes', value };
  if (Array.isArray(value) || isTypedNumberArray(value)) return { shape: 'sequence', value };
  if (value instanceof Set) return { shape: 'set', value };
  if (value instanceof Map) return { shape: 'mapping', value };
  if (value instanceof Ref) return { shape: 'reference', value };
  if (isChannelLike(value)) return { shape: 'channel', value };
  if (typeof value === 'object') return { shape: 'composite', value };
  // unreachable: every typeof result is handled above
  return { shape: 'nil', value: undefined };
}

function toNumericValue(value: number | bigint): Numeric {
  return typeof value === 'bigint' ? new Numeric('int64', value) : new Numeric('float64', value);
}

// Number, Boolean, String and BigInt wrapper objects
export function isBoxedPrimitive(value: object): value is Number | Boolean | String | BigInt {
  return (
    value instanceof Number ||
    value instanceof Boolean ||
    value instanceof String ||
    value instanceof BigInt
  );
}

/**
 * Fields of a composite in declaration order.
 *
 * Built-in composites expose synthetic fields: Date has `time`, boxed
 * primitives have `value`, RegExp has `source` and `flags`, Error adds
 * `message` to its own properties.
 */
export function fieldsOf(
  value: object,
  registry: CompositeRegistry = defaultRegistry,
): FieldDescriptor[] {
  if (value instanceof Date) {
    return [{ name: 'time', exported: true, value: value.getTime() }];
  }
  if (isBoxedPrimitive(value)) {
    return [{ name: 'value', exported: true, value: value.valueOf() }];
  }
  if (value instanceof RegExp) {
    return [
      { name: 'source', exported: true, value: value.source },
      { name: 'flags', exported: true, value: value.flags },
    ];
  }

  const entries: [string, unknown][] = Object.entries(value);
  const fields = entries.map(([name, fieldValue]) => ({
    name,
    exported: registry.isExported(value, name),
    value: fieldValue,
  }));

  if (value instanceof Error && !entries.some(([name]) => name === 'message')) {
    fields.unshift({ name: 'message', exported: true, value: value.message });
  }

  return fields;
}

export function isList(value: unknown): boolean {
  const shape = inspect(value).shape;
  return shape === 'sequence' || shape === 'bytes';
}

/** Elements of a list; typed array elements come back as Numeric */
export function elementsOf(list: Sequence | Uint8Array): unknown[] {
  if (list instanceof Uint8Array || isTypedNumberArray(list)) {
    const type = elementType(list);
    const elements: unknown[] = [];
    for (const element of list) {
      elements.push(
        new Numeric(type, typeof element === 'number' && isIntegerType(type) ? BigInt(element) : element),
      );
    }
    return elements;
  }
  return Array.from(list);
}

/** Element, entry or character count; undefined for shapes without a length */
export function lengthOf(value: unknown): number | undefined {
  const inspected = inspect(value);
  switch (inspected.shape) {
    case 'text':
    case 'bytes':
    case 'sequence':
      return inspected.value.length;
    case 'set':
    case 'mapping':
      return inspected.value.size;
    case 'channel':
      return inspected.value.readableLength;
    default:
      return undefined;
  }
}

function constructorName(value: object): string {
  const constructor: unknown = value.constructor;
  if (typeof constructor === 'function' && constructor.name) {
    return constructor.name;
  }
  return 'Object';
}

/**
 * Printable type name: numeric type names, primitive names, or the
 * constructor name of objects.
 */
export function typeName(value: unknown): string {
  const inspected = inspect(value);
  switch (inspected.shape) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return 'boolean';
    case 'numeric':
      return inspected.value.type;
    case 'text':
      return 'string';
    case 'symbol':
      return 'symbol';
    case 'callable':
      return 'function';
    case 'reference':
      return inspected.value.isNil ? 'Ref' : `Ref<${typeName(inspected.value.target)}>`;
    default:
      return constructorName(inspected.value);
  }
}

// Identity of a value's type: the numeric type, the prototype of objects, or the shape
export function typeKey(inspected: Inspected): unknown {
  switch (inspected.shape) {
    case 'numeric':
      return inspected.value.type;
    case 'bytes':
    case 'sequence':
    case 'set':
    case 'mapping':
    case 'composite':
    case 'channel': {
      const prototype: object | null = Object.getPrototypeOf(inspected.value);
      return prototype;
    }
    default:
      return inspected.shape;
  }
}

/**
 * Same shape and same type identity. Two references have the same type when
 * their targets do; a nil reference matches any reference.
 */
export function sameType(a: unknown, b: unknown): boolean {
  const left = inspect(a);
  const right = inspect(b);
  if (left.shape === 'reference' && right.shape === 'reference') {
    return left.value.isNil || right.value.isNil || sameType(left.value.target, right.value.target);
  }
  return left.shape === right.shape && typeKey(left) === typeKey(right);
}
