import { isNil } from './nil.js';
import { isTypedNumberArray } from './numeric.js';
import { Ref } from './reference.js';
import { type CompositeRegistry, defaultRegistry } from './registry.js';
import { fieldsOf, inspect, isBoxedPrimitive } from './shape.js';

// Originals already copied, so shared and cyclic objects map to one copy
type Copies = Map<object, unknown>;

function copyComposite(value: object, registry: CompositeRegistry, copies: Copies): object {
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof RegExp) return new RegExp(value);
  // Boxed primitives are immutable and have no hidden fields
  if (isBoxedPrimitive(value)) return value;

  const prototype: object | null = Object.getPrototypeOf(value);
  const result: Record<string, unknown> = Object.create(prototype);
  copies.set(value, result);

  for (const field of fieldsOf(value, registry)) {
    if (!field.exported || isNil(field.value)) continue;
    result[field.name] = copy(field.value, registry, copies);
  }
  return result;
}

function copy(value: unknown, registry: CompositeRegistry, copies: Copies): unknown {
  if (isNil(value)) return value;

  const inspected = inspect(value);
  if (typeof value === 'object' && value !== null && copies.has(value)) {
    return copies.get(value);
  }

  switch (inspected.shape) {
    case 'composite':
      return copyComposite(inspected.value, registry, copies);

    case 'reference': {
      const result = new Ref<unknown>(null);
      copies.set(inspected.value, result);
      result.target = copy(inspected.value.target, registry, copies);
      return result;
    }

    case 'sequence': {
      const sequence = inspected.value;
      if (isTypedNumberArray(sequence)) {
        // Typed numeric arrays hold no fields
        return sequence.slice();
      }
      const result: unknown[] = new Array(sequence.length);
      copies.set(sequence, result);
      for (let i = 0; i < sequence.length; i++) {
        const element: unknown = sequence[i];
        result[i] = isNil(element) ? element : copy(element, registry, copies);
      }
      return result;
    }

    case 'mapping': {
      const result = new Map<unknown, unknown>();
      copies.set(inspected.value, result);
      for (const [key, entry] of inspected.value) {
        result.set(key, copy(entry, registry, copies));
      }
      return result;
    }

    case 'set': {
      const result = new Set<unknown>();
      copies.set(inspected.value, result);
      for (const member of inspected.value) {
        result.add(copy(member, registry, copies));
      }
      return result;
    }

    default:
      return value;
  }
}

/**
 * Copy a value keeping only exported composite fields.
 *
 * Recurses through composites, references, lists, maps and sets, preserving
 * shape, length and index alignment. Nil fields are left out of the copy.
 * The input is never mutated.
 */
export function copyExported(value: unknown, registry: CompositeRegistry = defaultRegistry): unknown {
  return copy(value, registry, new Map());
}
