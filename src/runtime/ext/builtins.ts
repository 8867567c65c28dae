/**
 * Built-in Functions
 *
 * The print, len and get built-ins, written purely against the object
 * model's query operations. Host applications register further functions
 * with the same calling convention.
 */

import { RuntimeError } from '../../error-classes.js';
import { dictLookup } from '../core/dict.js';
import { printObject, type PrintSink } from '../core/printer.js';
import { lengthOf } from '../core/query.js';
import { addReference } from '../core/refcount.js';
import { createInteger, createNull } from '../core/scalars.js';
import type { ObjectRuntime } from '../core/types.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowObject,
} from '../core/values.js';

/** What a built-in sees of its call */
export interface BuiltinContext {
  readonly runtime: ObjectRuntime;
  /**
   * Fetch a bound argument by parameter name. The value is borrowed from
   * the caller for the duration of the call.
   */
  getArgument(name: string): TallowObject;
}

/**
 * Built-in implementation. Returns a value owned by the caller, or throws
 * a RuntimeError.
 */
export type BuiltinFn = (ctx: BuiltinContext) => TallowObject;

/** Parameter declaration */
export interface HostFunctionParam {
  readonly name: string;
  /** Human-readable parameter description (optional) */
  readonly description?: string;
}

/** Function registration: parameter declarations plus implementation */
export interface HostFunctionDefinition {
  readonly params: readonly HostFunctionParam[];
  readonly fn: BuiltinFn;
  /** Human-readable function description (optional) */
  readonly description?: string;
}

/** Sink writing through the runtime's onWrite callback */
function runtimeSink(runtime: ObjectRuntime): PrintSink {
  return { write: (text) => runtime.callbacks.onWrite(text) };
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: Readonly<Record<string, HostFunctionDefinition>> =
  {
    print: {
      description:
        'Print a value; list elements are printed separated by spaces',
      params: [{ name: 'object' }],
      fn: (ctx) => {
        const object = ctx.getArgument('object');
        const sink = runtimeSink(ctx.runtime);

        if (object.kind === OBJECT_KINDS.LIST) {
          let first = true;
          for (const element of object.slots) {
            if (element === undefined) continue;
            if (!first) sink.write(' ');
            first = false;
            printObject(sink, element, 0);
          }
        } else {
          printObject(sink, object, 0);
        }

        return createNull(ctx.runtime);
      },
    },

    len: {
      description: 'Length of a string, list or dict; 0 otherwise',
      params: [{ name: 'object' }],
      fn: (ctx) => createInteger(ctx.runtime, lengthOf(ctx.getArgument('object'))),
    },

    get: {
      description: 'Value stored under key, or null when the key is missing',
      params: [{ name: 'object' }, { name: 'key' }],
      fn: (ctx) => {
        const object = ctx.getArgument('object');
        const key = ctx.getArgument('key');

        if (object.kind === OBJECT_KINDS.DICT) {
          const value = dictLookup(object, key)?.value;
          if (value !== undefined) {
            addReference(value);
            return value;
          }
        } else if (object.kind !== OBJECT_KINDS.NULL) {
          throw new RuntimeError('TALLOW-R004', {
            kind: kindName(currentKind(object)),
          });
        }

        return createNull(ctx.runtime);
      },
    },
  };

/**
 * Call a registered function with named arguments.
 * Arguments stay owned by the caller; the result is owned by the caller.
 *
 * @throws RuntimeError for unknown functions, unbound parameters, or
 *   whatever the function itself reports
 */
export function invokeBuiltin(
  runtime: ObjectRuntime,
  name: string,
  args: Readonly<Record<string, TallowObject>>,
  functions: Readonly<Record<string, HostFunctionDefinition>> = BUILTIN_FUNCTIONS
): TallowObject {
  const definition = Object.hasOwn(functions, name)
    ? functions[name]
    : undefined;
  if (definition === undefined) {
    throw new RuntimeError('TALLOW-R005', { name });
  }

  for (const param of definition.params) {
    if (!Object.hasOwn(args, param.name)) {
      throw new RuntimeError('TALLOW-R006', { name, param: param.name });
    }
  }

  return definition.fn({
    runtime,
    getArgument: (param) => {
      const value = Object.hasOwn(args, param) ? args[param] : undefined;
      if (value === undefined) {
        throw new RuntimeError('TALLOW-R006', { name, param });
      }
      return value;
    },
  });
}
