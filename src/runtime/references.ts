import { ConfReference, ConfValue, confList, confString, formatReference } from './values';
import { InvalidAccessError } from './errors';

/**
 * Apply a reference's accessors to the value it points at.
 * Lists are indexed by element, strings by code point; ranges are half-open.
 */
export function applyAccessors(target: ConfValue, ref: ConfReference): ConfValue {
  let value = target;
  for (const accessor of ref.accessors) {
    if (value.kind !== 'list' && value.kind !== 'string') {
      throw new InvalidAccessError(formatReference(ref), `cannot index into ${value.kind}`);
    }
    const chars = value.kind === 'string' ? Array.from(value.value) : [];
    const length = value.kind === 'string' ? chars.length : value.elements.length;

    if (accessor.type === 'index') {
      if (accessor.index >= length) {
        throw new InvalidAccessError(
          formatReference(ref),
          `index ${accessor.index} is out of bounds (length ${length})`,
        );
      }
      value = value.kind === 'string'
        ? confString(chars[accessor.index])
        : value.elements[accessor.index];
      continue;
    }

    if (accessor.end > length) {
      throw new InvalidAccessError(
        formatReference(ref),
        `range ${accessor.start}..${accessor.end} is out of bounds (length ${length})`,
      );
    }
    value = value.kind === 'string'
      ? confString(chars.slice(accessor.start, accessor.end).join(''))
      : confList(value.elements.slice(accessor.start, accessor.end));
  }
  return value;
}
