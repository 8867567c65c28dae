/**
 * Value Ordering
 *
 * Total order over all values, used by relational operators and for
 * dictionary key equality (compare result 0).
 */

import { InternalError, invariant } from '../../error-classes.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowObject,
  type TallowString,
} from './values.js';

export type Ordering = -1 | 0 | 1;

function sign(difference: number | bigint): Ordering {
  if (difference < 0) return -1;
  if (difference > 0) return 1;
  return 0;
}

/** Byte-wise comparison; a proper prefix orders first */
function compareBytes(left: TallowString, right: TallowString): Ordering {
  const length = Math.min(left.size, right.size);
  for (let i = 0; i < length; i++) {
    const difference = left.bytes[i]! - right.bytes[i]!;
    if (difference !== 0) return sign(difference);
  }
  return sign(left.size - right.size);
}

/** Compare two list slots; a hole equals a hole and orders before values */
function compareSlots(
  left: TallowObject | undefined,
  right: TallowObject | undefined
): Ordering {
  if (left === undefined || right === undefined) {
    if (left === right) return 0;
    return left === undefined ? -1 : 1;
  }
  return compareObjects(left, right);
}

/**
 * Compare two values.
 *
 * - Different kinds order by kind tag (null < integer < string < dict <
 *   list < function).
 * - Integers numerically, strings byte-lexicographically, lists by length
 *   and then element by element.
 * - Dictionaries and functions by identity: stable within a process but
 *   otherwise arbitrary.
 * - A value always equals itself.
 */
export function compareObjects(
  left: TallowObject,
  right: TallowObject
): Ordering {
  for (const value of [left, right]) {
    invariant(currentKind(value) !== OBJECT_KINDS.INVALID, 'TALLOW-I002', {
      operation: 'compareObjects',
    });
  }
  // A list holding itself would otherwise recurse forever
  if (left === right) {
    return 0;
  }

  if (left.kind !== right.kind) {
    return sign(left.kind - right.kind);
  }

  switch (left.kind) {
    case OBJECT_KINDS.NULL:
      return 0;

    case OBJECT_KINDS.INTEGER:
      if (right.kind !== OBJECT_KINDS.INTEGER) break;
      return sign(left.value - right.value);

    case OBJECT_KINDS.STRING:
      if (right.kind !== OBJECT_KINDS.STRING) break;
      return compareBytes(left, right);

    case OBJECT_KINDS.LIST: {
      if (right.kind !== OBJECT_KINDS.LIST) break;
      const count = left.slots.length;
      if (count !== right.slots.length) {
        return sign(count - right.slots.length);
      }
      for (let i = 0; i < count; i++) {
        const result = compareSlots(left.slots[i], right.slots[i]);
        if (result !== 0) return result;
      }
      return 0;
    }

    case OBJECT_KINDS.DICT:
    case OBJECT_KINDS.FUNCTION:
      return sign(left.id - right.id);
  }

  throw new InternalError('TALLOW-I002', {
    operation: `compareObjects(${kindName(currentKind(left))}, ${kindName(currentKind(right))})`,
  });
}

/** Dictionary key equality */
export function objectsEqual(left: TallowObject, right: TallowObject): boolean {
  return compareObjects(left, right) === 0;
}
