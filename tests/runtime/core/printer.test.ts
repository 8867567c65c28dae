/**
 * Tallow Printer: formatting, escapes, wrapping and cycles
 */

import { describe, expect, it } from 'vitest';
import {
  createDict,
  createFunction,
  createList,
  createNull,
  createString,
  dictAssignSlot,
  dictSetElement,
  formatObject,
  listSet,
  printObject,
  quoteBytes,
  releaseReference,
} from '../../../src/index.js';
import { int, setup, show, str } from '../../helpers/runtime.js';

describe('scalars', () => {
  it('prints null and integers', () => {
    const { runtime } = setup();
    const nothing = createNull(runtime);
    const negative = int(runtime, -42);
    expect(show(nothing)).toBe('null');
    expect(show(negative)).toBe('-42');
    releaseReference(nothing);
    releaseReference(negative);
  });

  it('prints top-level strings raw and nested strings quoted', () => {
    const { runtime } = setup();
    const text = str(runtime, 'say "hi"\n');
    expect(show(text)).toBe('say "hi"\n');
    expect(formatObject(text, 1)).toBe('"say \\"hi\\"\\n"');
    releaseReference(text);
  });

  it('prints a hole as 0', () => {
    expect(formatObject(undefined)).toBe('0');
  });
});

describe('quoteBytes', () => {
  it('quotes the empty string', () => {
    expect(quoteBytes(new Uint8Array(0))).toBe('""');
  });

  it('uses named escapes', () => {
    const bytes = new TextEncoder().encode('\t\r\\\x07\b\f\v');
    expect(quoteBytes(bytes)).toBe('"\\t\\r\\\\\\a\\b\\f\\v"');
  });

  it('hex-escapes other control and non-ASCII bytes', () => {
    expect(quoteBytes(new Uint8Array([0x01, 0xff, 0x41, 0x00]))).toBe(
      '"\\x01\\xFFA\\x00"'
    );
  });
});

describe('lists', () => {
  it('prints short lists on one line', () => {
    const { runtime } = setup();
    const items = [int(runtime, 1), str(runtime, 'two'), createList(runtime)];
    const list = createList(runtime, [...items, undefined]);
    expect(show(list)).toBe('[1, "two", [], 0]');
    for (const value of [...items, list]) releaseReference(value);
  });

  it('breaks lines once a list reaches the wrap threshold', () => {
    const { runtime } = setup();
    const items = [1, 2, 3, 4, 5].map((n) => int(runtime, n));
    const list = createList(runtime, items);
    expect(show(list)).toBe('[1, \n 2, \n 3, \n 4, \n 5]');
    for (const value of [...items, list]) releaseReference(value);
  });

  it('indents nested lists by depth', () => {
    const { runtime } = setup();
    const inner = createList(runtime, undefined, 5);
    const outer = createList(runtime, [inner]);
    expect(show(outer)).toBe('[[0, \n  0, \n  0, \n  0, \n  0]]');
    releaseReference(inner);
    releaseReference(outer);
  });

  it('takes the wrap threshold from the runtime', () => {
    const { runtime } = setup({ print: { wrapThreshold: 2 } });
    const list = createList(runtime, undefined, 2);
    expect(show(list)).toBe('[0, \n 0]');
    releaseReference(list);
  });

  it('prints a list that contains itself', () => {
    const { runtime, heap } = setup();
    const list = createList(runtime, undefined, 1);
    listSet(list, 0, list);
    expect(show(list)).toBe('[[...]]');

    listSet(list, 0, undefined);
    releaseReference(list);
    expect(heap.stats().liveBlocks).toBe(0);
  });

  it('prints shared elements in full each time', () => {
    const { runtime } = setup();
    const one = int(runtime, 1);
    const inner = createList(runtime, [one]);
    const outer = createList(runtime, [inner, inner]);
    expect(show(outer)).toBe('[[1], [1]]');
    for (const value of [one, inner, outer]) releaseReference(value);
  });
});

describe('dictionaries', () => {
  it('prints one entry per line', () => {
    const { runtime } = setup();
    const dict = createDict(runtime);
    const a = str(runtime, 'a');
    const b = str(runtime, 'b');
    const one = int(runtime, 1);
    dictSetElement(dict, a, one);
    dictSetElement(dict, b, a);
    expect(show(dict)).toBe('{"a" : 1\n "b" : "a"}');
    for (const value of [dict, a, b, one]) releaseReference(value);
  });

  it('prints an empty dictionary', () => {
    const { runtime } = setup();
    const dict = createDict(runtime);
    expect(show(dict)).toBe('{}');
    releaseReference(dict);
  });

  it('prints a dictionary that contains itself', () => {
    const { runtime, heap } = setup();
    const dict = createDict(runtime);
    const key = str(runtime, 'self');
    const entry = dictSetElement(dict, key, dict);
    expect(show(dict)).toBe('{"self" : {...}}');

    const nothing = createNull(runtime);
    dictAssignSlot(entry, nothing);
    releaseReference(nothing);
    releaseReference(dict);
    releaseReference(key);
    expect(runtime.null.refCount).toBe(1);
    expect(heap.stats().liveBlocks).toBe(0);
  });
});

describe('functions', () => {
  it('prints the body handle number', () => {
    const { runtime } = setup();
    const body = {};
    const f = createFunction(runtime, undefined, body, {});
    const g = createFunction(runtime, undefined, {}, {});
    const h = createFunction(runtime, undefined, body, {});
    expect(show(f)).toBe('Function at 0x00000001');
    expect(show(g)).toBe('Function at 0x00000002');
    expect(show(h)).toBe('Function at 0x00000001');
    for (const value of [f, g, h]) releaseReference(value);
  });
});

describe('printObject', () => {
  it('writes to the sink in pieces', () => {
    const { runtime } = setup();
    const a = createString(runtime, new TextEncoder().encode('x'));
    const list = createList(runtime, [a]);
    const chunks: string[] = [];
    printObject({ write: (text) => chunks.push(text) }, list);
    expect(chunks).toEqual(['[', '"x"', ']']);
    releaseReference(a);
    releaseReference(list);
  });
});
