import { equal } from './equal.js';
import { CompareTypeError } from './errors.js';
import { elementsOf, inspect, typeName } from './shape.js';
import type { DiffResult, Sequence } from './types.js';

function listElements(list: unknown, label: string): unknown[] {
  const inspected = inspect(list);
  if (inspected.shape !== 'sequence' && inspected.shape !== 'bytes') {
    throw new CompareTypeError(`${label} has an unsupported type ${typeName(list)}, expecting a list`);
  }
  const elements: Sequence | Uint8Array = inspected.value;
  return elementsOf(elements);
}

/**
 * Diff two lists as multisets, ignoring order.
 *
 * Each instance of a duplicate is matched separately: an element present
 * twice in A and five times in B appears zero times in extraA and three
 * times in extraB.
 *
 * @throws {CompareTypeError} If either argument is not a list
 */
export function diffLists(listA: unknown, listB: unknown): DiffResult {
  const a = listElements(listA, 'listA');
  const b = listElements(listB, 'listB');

  // Indexes of b already matched
  const consumed = new Array<boolean>(b.length).fill(false);
  const extraA: unknown[] = [];

  for (const element of a) {
    const match = b.findIndex((candidate, j) => !consumed[j] && equal(candidate, element));
    if (match === -1) {
      extraA.push(element);
    } else {
      consumed[match] = true;
    }
  }

  const extraB = b.filter((_, j) => !consumed[j]);
  return { extraA, extraB };
}
