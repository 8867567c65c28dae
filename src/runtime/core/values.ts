/**
 * Tallow Value Types
 *
 * Every value starts with the same header: kind tag, reference count,
 * identity and the heap block that holds it. Kind-specific payloads extend
 * the header. Values are created and destroyed only through the
 * constructors in this directory and the reference-counting protocol.
 */

import type { HeapBlock } from './heap.js';
import type { ObjectRuntime } from './types.js';

/**
 * Kind tags. The numeric value defines the order between values of
 * different kinds.
 */
export const OBJECT_KINDS = {
  INVALID: 0,
  NULL: 1,
  INTEGER: 2,
  STRING: 3,
  DICT: 4,
  LIST: 5,
  FUNCTION: 6,
} as const;

export type ObjectKind = (typeof OBJECT_KINDS)[keyof typeof OBJECT_KINDS];

const KIND_NAMES: Record<ObjectKind, string> = {
  [OBJECT_KINDS.INVALID]: 'INVALID',
  [OBJECT_KINDS.NULL]: 'null',
  [OBJECT_KINDS.INTEGER]: 'integer',
  [OBJECT_KINDS.STRING]: 'string',
  [OBJECT_KINDS.DICT]: 'dict',
  [OBJECT_KINDS.LIST]: 'list',
  [OBJECT_KINDS.FUNCTION]: 'function',
};

/** Display name of a kind, as used in error messages */
export function kindName(kind: ObjectKind): string {
  return KIND_NAMES[kind];
}

/** Common prologue of every value */
export interface ObjectHeader {
  /** Set to INVALID when the value is torn down */
  kind: ObjectKind;
  refCount: number;
  /** Process-unique identity; orders dictionaries and functions */
  readonly id: number;
  readonly runtime: ObjectRuntime;
  /** Header block; undefined for the null singleton, which is never freed */
  block: HeapBlock | undefined;
}

export interface TallowNull extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.NULL;
}

export interface TallowInteger extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.INTEGER;
  /** Signed 64-bit */
  readonly value: bigint;
}

export interface TallowString extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.STRING;
  /** size + 1 bytes; the last one is always zero */
  bytes: Uint8Array;
  /** Byte length, excluding the terminator */
  size: number;
  buffer: HeapBlock | undefined;
}

export interface TallowList extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.LIST;
  /** undefined marks a hole */
  slots: (TallowObject | undefined)[];
  /** Slot array block; undefined while the list has no slots */
  slotBlock: HeapBlock | undefined;
}

/** Kinds allowed as dictionary keys */
export type TallowKey = TallowInteger | TallowString;

/**
 * One key/value association. The entry object is stable for the life of
 * the dictionary, so it doubles as an assignable slot for the value.
 */
export interface DictEntry {
  readonly key: TallowKey;
  value: TallowObject | undefined;
  readonly block: HeapBlock;
}

export interface TallowDict extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.DICT;
  /** Insertion order */
  entries: DictEntry[];
  count: number;
  /** Incremented once per newly added key */
  generation: number;
}

/**
 * Opaque reference into the host's syntax tree. Borrowed: the host must
 * keep it alive for as long as any function value refers to it.
 */
export type BodyHandle = object;

/**
 * Opaque reference into the host's loaded script. Borrowed, like
 * BodyHandle.
 */
export type ScriptHandle = object;

export interface TallowFunction extends ObjectHeader {
  readonly kind: typeof OBJECT_KINDS.FUNCTION;
  args: TallowList | undefined;
  body: BodyHandle | undefined;
  script: ScriptHandle | undefined;
}

/** Any live value */
export type TallowObject =
  | TallowNull
  | TallowInteger
  | TallowString
  | TallowList
  | TallowDict
  | TallowFunction;

export function isNull(value: TallowObject): value is TallowNull {
  return value.kind === OBJECT_KINDS.NULL;
}

export function isInteger(value: TallowObject): value is TallowInteger {
  return value.kind === OBJECT_KINDS.INTEGER;
}

export function isString(value: TallowObject): value is TallowString {
  return value.kind === OBJECT_KINDS.STRING;
}

export function isList(value: TallowObject): value is TallowList {
  return value.kind === OBJECT_KINDS.LIST;
}

export function isDict(value: TallowObject): value is TallowDict {
  return value.kind === OBJECT_KINDS.DICT;
}

export function isFunction(value: TallowObject): value is TallowFunction {
  return value.kind === OBJECT_KINDS.FUNCTION;
}

/** Type guard for values usable as dictionary keys */
export function isKey(value: TallowObject): value is TallowKey {
  return isInteger(value) || isString(value);
}

/** Current kind read through the header, which teardown may have changed */
export function currentKind(value: TallowObject): ObjectKind {
  const header: ObjectHeader = value;
  return header.kind;
}
