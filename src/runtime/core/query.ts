/**
 * Value Queries
 *
 * Length and truthiness across all kinds.
 */

import { InternalError } from '../../error-classes.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowObject,
} from './values.js';

/**
 * Length of a value: bytes of a string, slots of a list (holes included),
 * entries of a dictionary, and 0 for everything else.
 */
export function lengthOf(value: TallowObject): number {
  switch (value.kind) {
    case OBJECT_KINDS.STRING:
      return value.size;
    case OBJECT_KINDS.LIST:
      return value.slots.length;
    case OBJECT_KINDS.DICT:
      return value.count;
    default:
      return 0;
  }
}

/** Check if a value is truthy: non-zero, non-empty, or a function */
export function booleanValue(value: TallowObject): boolean {
  switch (value.kind) {
    case OBJECT_KINDS.NULL:
      return false;
    case OBJECT_KINDS.INTEGER:
      return value.value !== 0n;
    case OBJECT_KINDS.STRING:
      return value.size !== 0;
    case OBJECT_KINDS.LIST:
      return value.slots.length !== 0;
    case OBJECT_KINDS.DICT:
      return value.count !== 0;
    case OBJECT_KINDS.FUNCTION:
      return true;
  }

  throw new InternalError('TALLOW-I002', {
    operation: `booleanValue(${kindName(currentKind(value))})`,
  });
}
