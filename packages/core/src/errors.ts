/**
 * Error types for the comparison engine
 *
 * Comparisons themselves never throw; these errors signal misuse by the
 * caller (non-list input to a list operation, unrepresentable numbers,
 * conflicting registry definitions).
 */

/**
 * Base class for comparison errors
 */
export abstract class CompareError extends Error {
  /** JSON Pointer to the offending value (if known) */
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path ? `${message} at '${path}'` : message);
    this.name = this.constructor.name;
    this.path = path;
  }
}

/**
 * Thrown when an operation receives a value of an unsupported shape
 */
export class CompareTypeError extends CompareError {}

/**
 * Thrown when a number cannot be represented in the requested type
 */
export class CompareRangeError extends CompareError {}

/**
 * Thrown for duplicate or malformed composite registrations
 */
export class CompareRegistryError extends CompareError {}
