/**
 * Tallow Runtime
 *
 * Public API of the object model.
 *
 * Module Structure:
 * - core/: The object model
 *   - types.ts: Public types (ObjectRuntime, RuntimeOptions, callbacks)
 *   - values.ts: Value header, kinds and type guards
 *   - heap.ts: Allocator seam and accounting heap
 *   - context.ts: Runtime factory (owns the null singleton)
 *   - refcount.ts: Reference counting and teardown
 *   - scalars.ts, list.ts, dict.ts, function.ts: Per-kind operations
 *   - compare.ts, copy.ts, query.ts, printer.ts: Cross-kind operations
 * - ext/: Self-contained extensions
 *   - builtins.ts: print, len and get
 *   - interop.ts: Host data conversion
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ObjectRuntime,
  PrintOptions,
  RuntimeCallbacks,
  RuntimeOptions,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export {
  currentKind,
  isDict,
  isFunction,
  isInteger,
  isKey,
  isList,
  isNull,
  isString,
  kindName,
  OBJECT_KINDS,
  type BodyHandle,
  type DictEntry,
  type ObjectHeader,
  type ObjectKind,
  type ScriptHandle,
  type TallowDict,
  type TallowFunction,
  type TallowInteger,
  type TallowKey,
  type TallowList,
  type TallowNull,
  type TallowObject,
  type TallowString,
} from './core/values.js';

// ============================================================
// HEAP AND RUNTIME
// ============================================================

export {
  AccountingHeap,
  createHeap,
  DICT_ENTRY_SIZE,
  DICT_ITERATOR_SIZE,
  HEADER_SIZE,
  SLOT_SIZE,
  type Allocator,
  type HeapBlock,
  type HeapOptions,
  type HeapStats,
} from './core/heap.js';
export { createRuntime, DEFAULT_WRAP_THRESHOLD } from './core/context.js';
export {
  addReference,
  REFCOUNT_LIMIT,
  releaseReference,
} from './core/refcount.js';

// ============================================================
// CONSTRUCTION AND MUTATION
// ============================================================

export {
  createInteger,
  createNull,
  createString,
  createStringFromText,
  stringAdd,
  stringBytes,
  stringText,
} from './core/scalars.js';
export {
  createList,
  listAdd,
  listCount,
  listGet,
  listIterate,
  listIteratorDestroy,
  listIteratorInit,
  listSet,
  type ListIterator,
} from './core/list.js';
export {
  createDict,
  dictAdd,
  dictAssignSlot,
  dictIterate,
  dictIteratorDestroy,
  dictIteratorInit,
  dictLookup,
  dictSetElement,
  type DictIterator,
} from './core/dict.js';
export { createFunction } from './core/function.js';

// ============================================================
// CROSS-CUTTING OPERATIONS
// ============================================================

export { compareObjects, objectsEqual, type Ordering } from './core/compare.js';
export { copyObject } from './core/copy.js';
export { booleanValue, lengthOf } from './core/query.js';
export {
  formatObject,
  printObject,
  quoteBytes,
  type PrintSink,
} from './core/printer.js';

// ============================================================
// EXTENSIONS
// ============================================================

export {
  BUILTIN_FUNCTIONS,
  invokeBuiltin,
  type BuiltinContext,
  type BuiltinFn,
  type HostFunctionDefinition,
  type HostFunctionParam,
} from './ext/builtins.js';
export {
  fromHost,
  toHost,
  type HostData,
  type HostFunctionRef,
  type HostKey,
} from './ext/interop.js';
