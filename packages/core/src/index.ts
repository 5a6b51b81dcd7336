// @fixturekit/core - Structural comparison engine for test assertions

// Comparison
export * from './empty.js';
export * from './nil.js';
export * from './equal.js';
export * from './equal-values.js';
export * from './exported.js';
export * from './diff.js';
export * from './checks.js';
export * from './comparator.js';

// Value model
export * from './numeric.js';
export * from './reference.js';
export * from './registry.js';
export { elementsOf, fieldsOf, inspect, isChannelLike, isList, lengthOf, sameType, typeName } from './shape.js';
export * from './types.js';
export * from './errors.js';
export { appendPath } from './utils.js';
