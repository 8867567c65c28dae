/**
 * Host Interop
 *
 * Conversion between plain host data (as produced by JSON or YAML parsers)
 * and object-model values.
 */

import { RuntimeError, InternalError } from '../../error-classes.js';
import { createDict, dictSetElement } from '../core/dict.js';
import { createList, listSet } from '../core/list.js';
import { releaseReference } from '../core/refcount.js';
import {
  createInteger,
  createNull,
  createStringFromText,
  stringText,
} from '../core/scalars.js';
import type { ObjectRuntime } from '../core/types.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type BodyHandle,
  type ScriptHandle,
  type TallowDict,
  type TallowKey,
  type TallowList,
  type TallowObject,
} from '../core/values.js';

/** Dictionary key as seen by the host */
export type HostKey = number | bigint | string;

/** A function value as seen by the host */
export interface HostFunctionRef {
  readonly body: BodyHandle;
  readonly script: ScriptHandle;
  readonly params: HostData | undefined;
}

/** Host-side shape of a value */
export type HostData =
  | null
  | number
  | bigint
  | string
  | (HostData | undefined)[]
  | Map<HostKey, HostData>
  | HostFunctionRef;

// ============================================================
// HOST -> OBJECT MODEL
// ============================================================

/**
 * Convert host data into a new value owned by the caller.
 *
 * - null / undefined: null
 * - boolean: integer 0 or 1
 * - safe-integer number or bigint: integer
 * - string: UTF-8 string
 * - array: list; undefined elements become holes
 * - Map: dict with converted keys (integers or strings)
 * - plain object: dict with string keys
 *
 * @throws RuntimeError (TALLOW-R007) for data with no counterpart,
 *   (TALLOW-R008) for cyclic data
 */
export function fromHost(runtime: ObjectRuntime, data: unknown): TallowObject {
  return convertIn(runtime, data, new Set());
}

function convertIn(
  runtime: ObjectRuntime,
  data: unknown,
  path: Set<object>
): TallowObject {
  if (data === null || data === undefined) {
    return createNull(runtime);
  }

  switch (typeof data) {
    case 'boolean':
      return createInteger(runtime, data ? 1 : 0);
    case 'bigint':
      return createInteger(runtime, data);
    case 'number':
      if (!Number.isSafeInteger(data)) {
        throw new RuntimeError('TALLOW-R007', {
          value: String(data),
          reason: 'not a safe integer',
        });
      }
      return createInteger(runtime, data);
    case 'string':
      return createStringFromText(runtime, data);
    case 'object':
      break;
    default:
      throw new RuntimeError('TALLOW-R007', {
        value: String(data),
        reason: `unsupported ${typeof data}`,
      });
  }

  if (path.has(data)) {
    throw new RuntimeError('TALLOW-R008', {
      kind: Array.isArray(data) ? 'list' : 'dict',
    });
  }

  path.add(data);
  try {
    if (Array.isArray(data)) {
      const items: unknown[] = data;
      return listIn(runtime, items, path);
    }
    if (data instanceof Map) {
      const pairs: [unknown, unknown][] = [...data.entries()];
      return dictIn(runtime, pairs, path);
    }
    const pairs: [unknown, unknown][] = Object.entries(data);
    return dictIn(runtime, pairs, path);
  } finally {
    path.delete(data);
  }
}

function listIn(
  runtime: ObjectRuntime,
  items: unknown[],
  path: Set<object>
): TallowList {
  const list = createList(runtime, undefined, items.length);
  try {
    items.forEach((item, index) => {
      if (item === undefined) return;
      const element = convertIn(runtime, item, path);
      try {
        listSet(list, index, element);
      } finally {
        releaseReference(element);
      }
    });
  } catch (error) {
    releaseReference(list);
    throw error;
  }
  return list;
}

function dictIn(
  runtime: ObjectRuntime,
  pairs: [unknown, unknown][],
  path: Set<object>
): TallowDict {
  const dict = createDict(runtime);
  try {
    for (const [rawKey, rawValue] of pairs) {
      const key = convertIn(runtime, rawKey, path);
      try {
        const value = convertIn(runtime, rawValue, path);
        try {
          dictSetElement(dict, key, value);
        } finally {
          releaseReference(value);
        }
      } finally {
        releaseReference(key);
      }
    }
  } catch (error) {
    releaseReference(dict);
    throw error;
  }
  return dict;
}

// ============================================================
// OBJECT MODEL -> HOST
// ============================================================

/**
 * Convert a value into host data. Integers become numbers when they fit,
 * bigints otherwise; dictionaries become Maps; list holes stay undefined.
 *
 * @throws RuntimeError (TALLOW-R008) when the value contains itself
 */
export function toHost(value: TallowObject): HostData {
  return convertOut(value, new Set());
}

function integerOut(value: bigint): number | bigint {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

function keyOut(key: TallowKey): HostKey {
  return key.kind === OBJECT_KINDS.INTEGER ? integerOut(key.value) : stringText(key);
}

function convertOut(value: TallowObject, path: Set<TallowObject>): HostData {
  switch (value.kind) {
    case OBJECT_KINDS.NULL:
      return null;

    case OBJECT_KINDS.INTEGER:
      return integerOut(value.value);

    case OBJECT_KINDS.STRING:
      return stringText(value);

    case OBJECT_KINDS.FUNCTION: {
      const { body, script } = value;
      if (body === undefined || script === undefined) break;
      return {
        body,
        script,
        params: value.args === undefined ? undefined : convertOut(value.args, path),
      };
    }

    case OBJECT_KINDS.LIST:
    case OBJECT_KINDS.DICT: {
      if (path.has(value)) {
        throw new RuntimeError('TALLOW-R008', { kind: kindName(value.kind) });
      }
      path.add(value);
      try {
        if (value.kind === OBJECT_KINDS.LIST) {
          return value.slots.map((element) =>
            element === undefined ? undefined : convertOut(element, path)
          );
        }
        const map = new Map<HostKey, HostData>();
        for (const entry of value.entries) {
          map.set(
            keyOut(entry.key),
            entry.value === undefined ? null : convertOut(entry.value, path)
          );
        }
        return map;
      } finally {
        path.delete(value);
      }
    }
  }

  throw new InternalError('TALLOW-I002', {
    operation: `toHost(${kindName(currentKind(value))})`,
  });
}
