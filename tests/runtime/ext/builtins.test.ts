/**
 * Tallow Built-ins: print, len and get
 */

import { describe, expect, it } from 'vitest';
import {
  BUILTIN_FUNCTIONS,
  createDict,
  createList,
  createNull,
  dictSetElement,
  invokeBuiltin,
  releaseReference,
  RuntimeError,
  type HostFunctionDefinition,
} from '../../../src/index.js';
import { int, setup, show, str } from '../../helpers/runtime.js';

describe('print', () => {
  it('writes a scalar through onWrite and returns null', () => {
    const { runtime, output } = setup();
    const value = int(runtime, 42);
    const result = invokeBuiltin(runtime, 'print', { object: value });
    expect(output.join('')).toBe('42');
    expect(result).toBe(runtime.null);
    releaseReference(result);
    releaseReference(value);
  });

  it('writes list elements separated by spaces, skipping holes', () => {
    const { runtime, output } = setup();
    const one = int(runtime, 1);
    const text = str(runtime, 'a b');
    const inner = createList(runtime, [one]);
    const list = createList(runtime, [one, undefined, text, inner]);

    releaseReference(invokeBuiltin(runtime, 'print', { object: list }));
    expect(output.join('')).toBe('1 a b [1]');
    for (const value of [one, text, inner, list]) releaseReference(value);
  });
});

describe('len', () => {
  it('returns the length as an integer', () => {
    const { runtime } = setup();
    const text = str(runtime, 'abc');
    const result = invokeBuiltin(runtime, 'len', { object: text });
    expect(show(result)).toBe('3');
    releaseReference(result);
    releaseReference(text);
  });
});

describe('get', () => {
  it('returns the stored value with a new reference', () => {
    const { runtime } = setup();
    const dict = createDict(runtime);
    const key = str(runtime, 'k');
    const value = int(runtime, 7);
    dictSetElement(dict, key, value);

    const result = invokeBuiltin(runtime, 'get', { object: dict, key });
    expect(result).toBe(value);
    expect(value.refCount).toBe(3);
    for (const item of [result, dict, key, value]) releaseReference(item);
  });

  it('returns null for a missing key or a null dictionary', () => {
    const { runtime } = setup();
    const dict = createDict(runtime);
    const nothing = createNull(runtime);
    const key = str(runtime, 'missing');

    const missing = invokeBuiltin(runtime, 'get', { object: dict, key });
    const fromNull = invokeBuiltin(runtime, 'get', { object: nothing, key });
    expect(missing).toBe(runtime.null);
    expect(fromNull).toBe(runtime.null);
    for (const item of [missing, fromNull, dict, nothing, key]) {
      releaseReference(item);
    }
  });

  it('rejects other kinds', () => {
    const { runtime } = setup();
    const object = int(runtime, 1);
    expect(() => invokeBuiltin(runtime, 'get', { object, key: object })).toThrow(
      'get() passed non-dictionary object of type integer'
    );
    releaseReference(object);
  });
});

describe('invokeBuiltin', () => {
  it('rejects unknown functions', () => {
    const { runtime } = setup();
    expect(() => invokeBuiltin(runtime, 'nope', {})).toThrow(
      'Unknown function: nope'
    );
    expect(() => invokeBuiltin(runtime, 'toString', {})).toThrow(RuntimeError);
  });

  it('rejects missing arguments', () => {
    const { runtime } = setup();
    expect(() => invokeBuiltin(runtime, 'len', {})).toThrow(
      'Function len expects argument object'
    );
  });

  it('calls host-registered functions', () => {
    const { runtime } = setup();
    const functions: Record<string, HostFunctionDefinition> = {
      ...BUILTIN_FUNCTIONS,
      answer: {
        params: [],
        fn: (ctx) => int(ctx.runtime, 42),
      },
    };
    const result = invokeBuiltin(runtime, 'answer', {}, functions);
    expect(show(result)).toBe('42');
    releaseReference(result);
  });

  it('describes every built-in', () => {
    expect(Object.keys(BUILTIN_FUNCTIONS)).toEqual(['print', 'len', 'get']);
    expect(BUILTIN_FUNCTIONS['get']?.params.map((p) => p.name)).toEqual([
      'object',
      'key',
    ]);
  });
});
