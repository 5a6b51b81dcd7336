import { inspect } from './shape.js';

/**
 * Check if a value is nil without failing on shapes that have no nil state.
 *
 * Only the outer value is checked: a Ref to an object whose fields are all
 * nil is not nil.
 */
export function isNil(value: unknown): boolean {
  const inspected = inspect(value);
  switch (inspected.shape) {
    case 'nil':
      return true;
    case 'reference':
      return inspected.value.isNil;
    default:
      return false;
  }
}
