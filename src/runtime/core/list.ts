/**
 * List Values
 *
 * Owning, index-addressable sequences of slots. A slot holds either a live
 * value (one owned reference) or a hole. Holes come from gap-filling when
 * setting past the end, or from creating a list without initial values.
 *
 * List iteration has no mutation guard: setting or concatenating while an
 * iterator is live is allowed, and which elements the iterator then visits
 * depends on where the change happened. Hosts should not mutate a list
 * they are iterating.
 */

import { invariant, OutOfMemoryError } from '../../error-classes.js';
import { allocateBlock, HEADER_SIZE, SLOT_SIZE, type HeapBlock } from './heap.js';
import { addReference, releaseOptional } from './refcount.js';
import type { ObjectRuntime } from './types.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowList,
  type TallowObject,
} from './values.js';

/** Position of an in-progress list iteration */
export interface ListIterator {
  index: number;
}

export function expectList(value: TallowObject, operation: string): TallowList {
  invariant(value.kind === OBJECT_KINDS.LIST, 'TALLOW-I001', {
    operation,
    expected: 'list',
    actual: kindName(currentKind(value)),
  });
  return value;
}

/** Number of slots, holes included */
export function listCount(list: TallowList): number {
  return list.slots.length;
}

/**
 * Resize the slot block of a list to hold count slots. Leaves the list
 * untouched and throws when the allocator refuses.
 */
function resizeSlotBlock(
  list: TallowList,
  count: number,
  operation: string
): void {
  const allocator = list.runtime.allocator;
  let block: HeapBlock | undefined;
  if (list.slotBlock === undefined) {
    block = allocator.allocate(count * SLOT_SIZE);
  } else {
    block = allocator.reallocate(list.slotBlock, count * SLOT_SIZE);
  }
  if (block === undefined) {
    throw new OutOfMemoryError(operation);
  }
  list.slotBlock = block;
}

/**
 * Create a list of size slots. With initial values, each non-hole slot
 * gains a reference; without them every slot is a hole.
 */
export function createList(
  runtime: ObjectRuntime,
  initial?: readonly (TallowObject | undefined)[],
  size: number = initial?.length ?? 0
): TallowList {
  invariant(
    Number.isSafeInteger(size) &&
      size >= 0 &&
      (initial === undefined || size <= initial.length),
    'TALLOW-I001',
    {
      operation: 'createList',
      expected: `${size} initial slots`,
      actual: `${initial?.length ?? 0}`,
    }
  );

  const block = allocateBlock(runtime.allocator, HEADER_SIZE, 'createList');
  let slotBlock: HeapBlock | undefined;
  if (size !== 0) {
    slotBlock = runtime.allocator.allocate(size * SLOT_SIZE);
    if (slotBlock === undefined) {
      runtime.allocator.free(block);
      throw new OutOfMemoryError('createList');
    }
  }

  const slots: (TallowObject | undefined)[] = new Array<
    TallowObject | undefined
  >(size).fill(undefined);
  if (initial !== undefined) {
    for (let i = 0; i < size; i++) {
      const element = initial[i];
      if (element !== undefined) {
        addReference(element);
        slots[i] = element;
      }
    }
  }

  return {
    kind: OBJECT_KINDS.LIST,
    refCount: 1,
    id: runtime.nextId(),
    runtime,
    block,
    slots,
    slotBlock,
  };
}

/**
 * Look up the element at index.
 * Returns a new reference the caller must release, or undefined when the
 * index is out of range or the slot is a hole.
 */
export function listGet(
  list: TallowObject,
  index: number
): TallowObject | undefined {
  const target = expectList(list, 'listGet');
  if (!Number.isInteger(index) || index < 0 || index >= target.slots.length) {
    return undefined;
  }

  const element = target.slots[index];
  if (element !== undefined) {
    addReference(element);
  }
  return element;
}

/**
 * Store value at index, growing the list with holes when index is past
 * the end. The slot's previous occupant is released; passing undefined
 * leaves a hole. On allocation failure the list is unchanged.
 */
export function listSet(
  list: TallowObject,
  index: number,
  value: TallowObject | undefined
): void {
  const target = expectList(list, 'listSet');
  invariant(Number.isSafeInteger(index) && index >= 0, 'TALLOW-I001', {
    operation: 'listSet',
    expected: 'a non-negative integer index',
    actual: String(index),
  });

  if (index >= target.slots.length) {
    resizeSlotBlock(target, index + 1, 'listSet');
    while (target.slots.length <= index) {
      target.slots.push(undefined);
    }
  }

  // Reference first so storing a slot's own occupant cannot destroy it
  if (value !== undefined) {
    addReference(value);
  }
  const previous = target.slots[index];
  target.slots[index] = value;
  releaseOptional(previous);
}

/**
 * Append the slots of addition to destination in place. Holes are carried
 * over as holes. On allocation failure destination is unchanged.
 */
export function listAdd(destination: TallowObject, addition: TallowObject): void {
  const target = expectList(destination, 'listAdd');
  const source = expectList(addition, 'listAdd');

  // Snapshot first: the two may be the same list
  const tail = source.slots.slice();
  const newCount = target.slots.length + tail.length;
  if (newCount !== 0) {
    resizeSlotBlock(target, newCount, 'listAdd');
  }

  for (const element of tail) {
    if (element !== undefined) {
      addReference(element);
    }
    target.slots.push(element);
  }
}

/** Start (or restart) an iteration */
export function listIteratorInit(list: TallowObject): ListIterator {
  expectList(list, 'listIteratorInit');
  return { index: 0 };
}

/**
 * Advance an iteration, skipping holes.
 * Returns a borrowed element, valid until the list is next mutated, or
 * undefined once the end is reached.
 */
export function listIterate(
  list: TallowObject,
  iterator: ListIterator
): TallowObject | undefined {
  const target = expectList(list, 'listIterate');
  while (iterator.index < target.slots.length) {
    const element = target.slots[iterator.index];
    iterator.index += 1;
    if (element !== undefined) {
      return element;
    }
  }
  return undefined;
}

/** Finish an iteration */
export function listIteratorDestroy(iterator: ListIterator): void {
  iterator.index = 0;
}
