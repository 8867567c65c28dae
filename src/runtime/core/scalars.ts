/**
 * Scalar Values
 *
 * Constructors for null, integer and string values, plus string
 * concatenation.
 */

import { invariant, OutOfMemoryError } from '../../error-classes.js';
import { allocateBlock, HEADER_SIZE } from './heap.js';
import { addReference } from './refcount.js';
import type { ObjectRuntime } from './types.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowInteger,
  type TallowNull,
  type TallowObject,
  type TallowString,
} from './values.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Return the runtime's null value with an added reference.
 * There is only ever one null per runtime; callers must not rely on that
 * and release it like any other value.
 */
export function createNull(runtime: ObjectRuntime): TallowNull {
  addReference(runtime.null);
  return runtime.null;
}

/** Create an integer; the value is wrapped to signed 64 bits */
export function createInteger(
  runtime: ObjectRuntime,
  value: bigint | number
): TallowInteger {
  invariant(
    typeof value === 'bigint' || Number.isSafeInteger(value),
    'TALLOW-I001',
    {
      operation: 'createInteger',
      expected: 'an integer',
      actual: String(value),
    }
  );

  const block = allocateBlock(runtime.allocator, HEADER_SIZE, 'createInteger');
  return {
    kind: OBJECT_KINDS.INTEGER,
    refCount: 1,
    id: runtime.nextId(),
    runtime,
    block,
    value: BigInt.asIntN(64, BigInt(value)),
  };
}

/**
 * Create a string holding a copy of the first `size` bytes of `initial`
 * (all of them by default). Without `initial` the payload is `size` zero
 * bytes. The buffer always carries one extra terminating zero byte.
 */
export function createString(
  runtime: ObjectRuntime,
  initial?: Uint8Array,
  size: number = initial?.length ?? 0
): TallowString {
  invariant(Number.isSafeInteger(size) && size >= 0, 'TALLOW-I001', {
    operation: 'createString',
    expected: 'a non-negative integer size',
    actual: String(size),
  });
  invariant(
    initial === undefined || size <= initial.length,
    'TALLOW-I001',
    {
      operation: 'createString',
      expected: `at least ${size} bytes`,
      actual: `${initial?.length ?? 0} bytes`,
    }
  );

  const block = allocateBlock(runtime.allocator, HEADER_SIZE, 'createString');
  const buffer = runtime.allocator.allocate(size + 1);
  if (buffer === undefined) {
    runtime.allocator.free(block);
    throw new OutOfMemoryError('createString');
  }

  const bytes = new Uint8Array(size + 1);
  if (initial !== undefined) {
    bytes.set(initial.subarray(0, size));
  }

  return {
    kind: OBJECT_KINDS.STRING,
    refCount: 1,
    id: runtime.nextId(),
    runtime,
    block,
    bytes,
    size,
    buffer,
  };
}

/** Create a string from UTF-8 encoded text */
export function createStringFromText(
  runtime: ObjectRuntime,
  text: string
): TallowString {
  return createString(runtime, encoder.encode(text));
}

/** Payload bytes of a string, without the terminator */
export function stringBytes(value: TallowString): Uint8Array {
  return value.bytes.subarray(0, value.size);
}

/** Decode a string's payload as UTF-8 */
export function stringText(value: TallowString): string {
  return decoder.decode(stringBytes(value));
}

function expectString(value: TallowObject, operation: string): TallowString {
  invariant(value.kind === OBJECT_KINDS.STRING, 'TALLOW-I001', {
    operation,
    expected: 'string',
    actual: kindName(currentKind(value)),
  });
  return value;
}

/** Concatenate two strings into a new string */
export function stringAdd(
  left: TallowObject,
  right: TallowObject
): TallowString {
  const lhs = expectString(left, 'stringAdd');
  const rhs = expectString(right, 'stringAdd');

  const result = createString(lhs.runtime, undefined, lhs.size + rhs.size);
  result.bytes.set(stringBytes(lhs), 0);
  result.bytes.set(stringBytes(rhs), lhs.size);
  return result;
}
