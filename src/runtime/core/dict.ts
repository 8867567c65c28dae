/**
 * Dictionary Values
 *
 * Insertion-ordered key/value associations. Keys are integers or strings,
 * compared with compareObjects; lookup is a linear scan, which keeps
 * iteration order trivial for the small, configuration-sized data these
 * dictionaries hold.
 *
 * Every newly added key bumps the dictionary's generation. Iterators
 * remember the generation they started at and refuse to continue once it
 * has moved. Replacing the value of an existing key does not count.
 */

import {
  ConcurrentModificationError,
  InvalidKeyError,
  invariant,
  type TallowError,
} from '../../error-classes.js';
import {
  allocateBlock,
  DICT_ENTRY_SIZE,
  DICT_ITERATOR_SIZE,
  HEADER_SIZE,
  type HeapBlock,
} from './heap.js';
import { objectsEqual } from './compare.js';
import { addReference, releaseOptional, releaseReference } from './refcount.js';
import type { ObjectRuntime } from './types.js';
import {
  currentKind,
  isKey,
  kindName,
  OBJECT_KINDS,
  type DictEntry,
  type TallowDict,
  type TallowKey,
  type TallowObject,
} from './values.js';

/** State of an in-progress dictionary iteration */
export interface DictIterator {
  /** Index of the next entry to return */
  next: number;
  /** Dictionary generation when the iteration started */
  readonly generation: number;
  /** Accounting block; undefined once destroyed */
  block: HeapBlock | undefined;
  readonly runtime: ObjectRuntime;
}

export function expectDict(value: TallowObject, operation: string): TallowDict {
  invariant(value.kind === OBJECT_KINDS.DICT, 'TALLOW-I001', {
    operation,
    expected: 'dict',
    actual: kindName(currentKind(value)),
  });
  return value;
}

/** Report a recoverable error through the runtime, then hand it back to throw */
function report<T extends TallowError>(runtime: ObjectRuntime, error: T): T {
  runtime.callbacks.onDiagnostic(error);
  return error;
}

/**
 * Create a dictionary, optionally filled with the entries of source. Keys
 * and values are shared with source, not duplicated.
 */
export function createDict(
  runtime: ObjectRuntime,
  source?: TallowObject
): TallowDict {
  const from = source === undefined ? undefined : expectDict(source, 'createDict');
  const block = allocateBlock(runtime.allocator, HEADER_SIZE, 'createDict');
  const dict: TallowDict = {
    kind: OBJECT_KINDS.DICT,
    refCount: 1,
    id: runtime.nextId(),
    runtime,
    block,
    entries: [],
    count: 0,
    generation: 0,
  };

  if (from !== undefined) {
    try {
      for (const entry of from.entries) {
        dictSetElement(dict, entry.key, entry.value ?? runtime.null);
      }
    } catch (error) {
      releaseReference(dict);
      throw error;
    }
  }

  return dict;
}

/**
 * Find the entry for key, scanning in insertion order.
 * The entry is borrowed from the dictionary.
 */
export function dictLookup(
  dict: TallowObject,
  key: TallowObject
): DictEntry | undefined {
  const target = expectDict(dict, 'dictLookup');
  for (const entry of target.entries) {
    if (objectsEqual(entry.key, key)) {
      return entry;
    }
  }
  return undefined;
}

/**
 * Set key to value, adding the key when it is new.
 *
 * Returns the entry, which stays valid for the life of the dictionary and
 * can be assigned through later with dictAssignSlot.
 *
 * @throws InvalidKeyError when key is not an integer or string
 * @throws OutOfMemoryError when a new entry cannot be allocated
 */
export function dictSetElement(
  dict: TallowObject,
  key: TallowObject,
  value: TallowObject
): DictEntry {
  const target = expectDict(dict, 'dictSetElement');
  if (!isKey(key)) {
    throw report(target.runtime, new InvalidKeyError(kindName(currentKind(key))));
  }

  let entry = dictLookup(target, key);
  if (entry === undefined) {
    entry = appendEntry(target, key);
  }

  dictAssignSlot(entry, value);
  return entry;
}

function appendEntry(dict: TallowDict, key: TallowKey): DictEntry {
  const block = allocateBlock(
    dict.runtime.allocator,
    DICT_ENTRY_SIZE,
    'dictSetElement'
  );
  addReference(key);
  const entry: DictEntry = { key, value: undefined, block };
  dict.entries.push(entry);
  dict.generation += 1;
  dict.count += 1;
  return entry;
}

/**
 * Assign through an entry returned by dictSetElement. The new value gains
 * a reference and the previous one is released.
 */
export function dictAssignSlot(entry: DictEntry, value: TallowObject): void {
  addReference(value);
  const previous = entry.value;
  entry.value = value;
  releaseOptional(previous);
}

/**
 * Merge the entries of addition into destination. Existing keys keep their
 * position and take the new value; new keys are appended. Stops at the
 * first failure, keeping the entries merged so far.
 */
export function dictAdd(destination: TallowObject, addition: TallowObject): void {
  const target = expectDict(destination, 'dictAdd');
  const source = expectDict(addition, 'dictAdd');

  // Snapshot: merging a dictionary into itself must not see its own appends
  for (const entry of source.entries.slice()) {
    dictSetElement(target, entry.key, entry.value ?? target.runtime.null);
  }
}

/** Start an iteration at the first entry */
export function dictIteratorInit(dict: TallowObject): DictIterator {
  const target = expectDict(dict, 'dictIteratorInit');
  const block = allocateBlock(
    target.runtime.allocator,
    DICT_ITERATOR_SIZE,
    'dictIteratorInit'
  );
  return {
    next: 0,
    generation: target.generation,
    block,
    runtime: target.runtime,
  };
}

/**
 * Advance an iteration.
 * Returns the next key, borrowed from the dictionary, or undefined at the
 * end. Use dictLookup with the key to reach its value.
 *
 * @throws ConcurrentModificationError when a key was added since the
 *   iteration started; the dictionary itself is unaffected
 */
export function dictIterate(
  dict: TallowObject,
  iterator: DictIterator
): TallowKey | undefined {
  const target = expectDict(dict, 'dictIterate');
  invariant(iterator.block !== undefined, 'TALLOW-I002', {
    operation: 'dictIterate',
  });

  if (iterator.generation !== target.generation) {
    throw report(
      target.runtime,
      new ConcurrentModificationError(iterator.generation, target.generation)
    );
  }

  const entry = target.entries[iterator.next];
  if (entry === undefined) {
    return undefined;
  }
  iterator.next += 1;
  return entry.key;
}

/** Release an iterator; safe to call more than once */
export function dictIteratorDestroy(iterator: DictIterator): void {
  if (iterator.block !== undefined) {
    iterator.runtime.allocator.free(iterator.block);
    iterator.block = undefined;
  }
}
