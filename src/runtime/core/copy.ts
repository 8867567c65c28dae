/**
 * Value Copy
 *
 * Assignment-by-value duplication. Scalars are duplicated outright.
 * Containers are duplicated one level deep: the new list or dictionary
 * shares its elements with the source, so nested containers stay aliased.
 * Functions share their parameter list and handles.
 */

import { InternalError, invariant } from '../../error-classes.js';
import { createDict } from './dict.js';
import { createFunction } from './function.js';
import { createList } from './list.js';
import { createInteger, createNull, createString } from './scalars.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowObject,
} from './values.js';

/** Duplicate a value; the result is a new reference owned by the caller */
export function copyObject(source: TallowObject): TallowObject {
  const runtime = source.runtime;
  switch (source.kind) {
    case OBJECT_KINDS.NULL:
      return createNull(runtime);

    case OBJECT_KINDS.INTEGER:
      return createInteger(runtime, source.value);

    case OBJECT_KINDS.STRING:
      return createString(runtime, source.bytes, source.size);

    case OBJECT_KINDS.LIST:
      return createList(runtime, source.slots);

    case OBJECT_KINDS.DICT:
      return createDict(runtime, source);

    case OBJECT_KINDS.FUNCTION: {
      const { body, script } = source;
      invariant(body !== undefined && script !== undefined, 'TALLOW-I002', {
        operation: 'copyObject',
      });
      return createFunction(runtime, source.args, body, script);
    }
  }

  throw new InternalError('TALLOW-I002', {
    operation: `copyObject(${kindName(currentKind(source))})`,
  });
}
