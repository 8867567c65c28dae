/**
 * Reference Counting
 *
 * add/release shared by every kind. Releasing the last reference tears
 * down the kind-specific payload, marks the header INVALID and frees the
 * header block.
 */

import { InternalError, invariant } from '../../error-classes.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type ObjectHeader,
  type TallowDict,
  type TallowList,
  type TallowObject,
} from './values.js';

/** Exclusive upper bound for a sane reference count */
export const REFCOUNT_LIMIT = 0x10000000;

function checkHeader(value: TallowObject, operation: string): void {
  invariant(currentKind(value) !== OBJECT_KINDS.INVALID, 'TALLOW-I002', {
    operation,
  });
  invariant(
    value.refCount > 0 && value.refCount < REFCOUNT_LIMIT,
    'TALLOW-I003',
    { operation, refCount: value.refCount }
  );
}

/** Add an owner to a value */
export function addReference(value: TallowObject): void {
  checkHeader(value, 'addReference');
  value.refCount += 1;
}

/** Drop an owner; destroys the value when the last owner goes */
export function releaseReference(value: TallowObject): void {
  checkHeader(value, 'releaseReference');
  invariant(
    !(value.kind === OBJECT_KINDS.NULL && value.refCount === 1),
    'TALLOW-I004'
  );

  value.refCount -= 1;
  if (value.refCount === 0) {
    destroyObject(value);
  }
}

/** Release a value that may be a list hole */
export function releaseOptional(value: TallowObject | undefined): void {
  if (value !== undefined) {
    releaseReference(value);
  }
}

function destroyObject(value: TallowObject): void {
  gutObject(value);

  const header: ObjectHeader = value;
  header.kind = OBJECT_KINDS.INVALID;
  if (header.block !== undefined) {
    value.runtime.allocator.free(header.block);
    header.block = undefined;
  }
}

/** Tear down the payload of a value whose count reached zero */
function gutObject(value: TallowObject): void {
  switch (value.kind) {
    case OBJECT_KINDS.NULL:
      // releaseReference refuses to drop the last null reference
      throw new InternalError('TALLOW-I004');

    case OBJECT_KINDS.INTEGER:
      break;

    case OBJECT_KINDS.STRING:
      if (value.buffer !== undefined) {
        value.runtime.allocator.free(value.buffer);
        value.buffer = undefined;
      }
      value.bytes = new Uint8Array(0);
      value.size = 0;
      break;

    case OBJECT_KINDS.LIST:
      destroyList(value);
      break;

    case OBJECT_KINDS.DICT:
      destroyDict(value);
      break;

    case OBJECT_KINDS.FUNCTION:
      if (value.args !== undefined) {
        const args = value.args;
        value.args = undefined;
        releaseReference(args);
      }
      // Borrowed: cleared, never freed
      value.body = undefined;
      value.script = undefined;
      break;

    default: {
      const unknown: never = value;
      throw new InternalError('TALLOW-I001', {
        operation: 'releaseReference',
        expected: 'a known kind',
        actual: kindName(currentKind(unknown)),
      });
    }
  }
}

function destroyList(list: TallowList): void {
  const slots = list.slots;
  list.slots = [];
  for (const element of slots) {
    releaseOptional(element);
  }
  if (list.slotBlock !== undefined) {
    list.runtime.allocator.free(list.slotBlock);
    list.slotBlock = undefined;
  }
}

function destroyDict(dict: TallowDict): void {
  while (dict.entries.length > 0) {
    const entry = dict.entries.shift();
    if (entry === undefined) break;

    releaseReference(entry.key);
    const value = entry.value;
    entry.value = undefined;
    releaseOptional(value);
    dict.runtime.allocator.free(entry.block);
    dict.count -= 1;
  }

  invariant(dict.count === 0, 'TALLOW-I005', {
    operation: 'destroyDict',
    reason: `${dict.count} entries left after teardown`,
  });
}
