/**
 * Pointer-like box around a value.
 *
 * A Ref whose target is null or undefined is a nil reference: the Ref
 * exists but points to nothing.
 */
export class Ref<T> {
  constructor(public target: T | null = null) {}

  get isNil(): boolean {
    return this.target === null || this.target === undefined;
  }

  toString(): string {
    return this.isNil ? 'Ref(nil)' : `Ref(${String(this.target)})`;
  }
}

export function ref<T>(target: T): Ref<T> {
  return new Ref(target);
}

export function nilRef<T = unknown>(): Ref<T> {
  return new Ref<T>(null);
}
