import { z } from 'zod';
import { CompareRegistryError } from './errors.js';
import type { CompositeDefinition } from './types.js';

// Any class; instances are looked up by their exact prototype
export type CompositeType = abstract new (...args: never[]) => object;

const compositeDefinitionSchema = z.object({
  exported: z
    .array(z.string().min(1))
    .refine((names) => new Set(names).size === names.length, 'field names must be unique'),
  description: z.string().optional(),
});

/**
 * Declares which fields of a composite type are exported.
 *
 * Types without a definition fall back to the naming convention: a field is
 * exported unless its name starts with an underscore.
 */
export class CompositeRegistry {
  private types = new Map<object, { type: CompositeType; definition: CompositeDefinition }>();

  register(type: CompositeType, definition: CompositeDefinition): void {
    const prototype: unknown = type.prototype;
    if (typeof prototype !== 'object' || prototype === null) {
      throw new CompareRegistryError(`Type '${type.name}' has no prototype`);
    }
    if (this.types.has(prototype)) {
      throw new CompareRegistryError(`Composite type '${type.name}' is already registered`);
    }

    const parsed = compositeDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CompareRegistryError(
        `Invalid definition for '${type.name}': ${issue?.message ?? 'unknown issue'}`,
      );
    }

    this.types.set(prototype, { type, definition: parsed.data });
  }

  get(type: CompositeType): CompositeDefinition | undefined {
    const prototype: unknown = type.prototype;
    if (typeof prototype !== 'object' || prototype === null) return undefined;
    return this.types.get(prototype)?.definition;
  }

  has(type: CompositeType): boolean {
    return this.get(type) !== undefined;
  }

  /** Definition registered for the exact type of `value` */
  definitionOf(value: object): CompositeDefinition | undefined {
    const prototype: object | null = Object.getPrototypeOf(value);
    if (prototype === null) return undefined;
    return this.types.get(prototype)?.definition;
  }

  isExported(value: object, field: string): boolean {
    const definition = this.definitionOf(value);
    if (definition) {
      return definition.exported.includes(field);
    }
    return !field.startsWith('_');
  }

  getAll(): Map<CompositeType, CompositeDefinition> {
    return new Map([...this.types.values()].map(({ type, definition }) => [type, definition]));
  }
}

/** Registry used by the module-level functions */
export const defaultRegistry = new CompositeRegistry();
