/**
 * Derived views over list values: flattening and the key/value dictionary
 * reading of a list of pairs.
 */

import { ConfValue, ScalarValue, valueToString } from './values';
import { DuplicateKeyError, StructuralMismatchError, TypeMismatchError } from './errors';

/**
 * All scalar leaves of a list, depth-first and left to right.
 * Walks with an explicit stack of cursors, so arbitrarily deep lists are fine.
 */
export function flattenValue(value: ConfValue, subject?: string): ScalarValue[] {
  if (value.kind !== 'list') {
    throw new TypeMismatchError('list', value.kind, subject);
  }

  const leaves: ScalarValue[] = [];
  const cursors: { items: readonly ConfValue[]; index: number }[] = [
    { items: value.elements, index: 0 },
  ];

  while (cursors.length > 0) {
    const top = cursors[cursors.length - 1];
    if (top.index >= top.items.length) {
      cursors.pop();
      continue;
    }
    const item = top.items[top.index++];
    if (item.kind === 'list') {
      cursors.push({ items: item.elements, index: 0 });
    } else {
      leaves.push(item);
    }
  }

  return leaves;
}

/**
 * Reads `[[key, value], ...]` as an ordered map keyed by each key's
 * display string. Every element must be a two-element list and keys must
 * be distinct.
 */
export function dictView(value: ConfValue, subject = 'value'): Map<string, ConfValue> {
  if (value.kind !== 'list') {
    throw new TypeMismatchError('list', value.kind, subject);
  }

  const entries = new Map<string, ConfValue>();
  value.elements.forEach((element, index) => {
    if (element.kind !== 'list') {
      throw new StructuralMismatchError(subject, index, element.kind);
    }
    if (element.elements.length !== 2) {
      throw new StructuralMismatchError(subject, index, `a list of ${element.elements.length}`);
    }
    const [keyValue, entry] = element.elements;
    const key = valueToString(keyValue);
    if (entries.has(key)) {
      throw new DuplicateKeyError(subject, key);
    }
    entries.set(key, entry);
  });

  return entries;
}
