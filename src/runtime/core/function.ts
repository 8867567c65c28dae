/**
 * Function Values
 *
 * A function value carries its parameter list (owned) and two borrowed
 * handles: the body in the host's syntax tree and the script it was
 * defined in. The object model never frees or looks inside the handles;
 * the host guarantees they outlive every function value built on them.
 */

import { allocateBlock, HEADER_SIZE } from './heap.js';
import { expectList } from './list.js';
import { addReference } from './refcount.js';
import type { ObjectRuntime } from './types.js';
import {
  OBJECT_KINDS,
  type BodyHandle,
  type ScriptHandle,
  type TallowFunction,
  type TallowObject,
} from './values.js';

/** Create a function value; args (if any) gains a reference */
export function createFunction(
  runtime: ObjectRuntime,
  args: TallowObject | undefined,
  body: BodyHandle,
  script: ScriptHandle
): TallowFunction {
  const params = args === undefined ? undefined : expectList(args, 'createFunction');
  const block = allocateBlock(runtime.allocator, HEADER_SIZE, 'createFunction');
  if (params !== undefined) {
    addReference(params);
  }

  return {
    kind: OBJECT_KINDS.FUNCTION,
    refCount: 1,
    id: runtime.nextId(),
    runtime,
    block,
    args: params,
    body,
    script,
  };
}
