/**
 * Tallow Queries: lengthOf and booleanValue
 */

import { describe, expect, it } from 'vitest';
import {
  booleanValue,
  createDict,
  createFunction,
  createList,
  createNull,
  dictSetElement,
  lengthOf,
  releaseReference,
  type TallowObject,
} from '../../../src/index.js';
import { int, setup, str } from '../../helpers/runtime.js';

describe('lengthOf', () => {
  it('counts string bytes', () => {
    const { runtime } = setup();
    const ascii = str(runtime, 'hello');
    const accented = str(runtime, 'café');
    expect(lengthOf(ascii)).toBe(5);
    expect(lengthOf(accented)).toBe(5);
    releaseReference(ascii);
    releaseReference(accented);
  });

  it('counts list slots including holes', () => {
    const { runtime } = setup();
    const list = createList(runtime, undefined, 3);
    expect(lengthOf(list)).toBe(3);
    releaseReference(list);
  });

  it('counts dictionary entries', () => {
    const { runtime } = setup();
    const dict = createDict(runtime);
    const key = int(runtime, 1);
    dictSetElement(dict, key, key);
    expect(lengthOf(dict)).toBe(1);
    releaseReference(dict);
    releaseReference(key);
  });

  it('is zero for scalars and functions', () => {
    const { runtime } = setup();
    const values: TallowObject[] = [
      createNull(runtime),
      int(runtime, 123),
      createFunction(runtime, undefined, {}, {}),
    ];
    expect(values.map(lengthOf)).toEqual([0, 0, 0]);
    for (const value of values) releaseReference(value);
  });
});

describe('booleanValue', () => {
  it('is false for null, zero and empty values', () => {
    const { runtime } = setup();
    const values: TallowObject[] = [
      createNull(runtime),
      int(runtime, 0),
      str(runtime, ''),
      createList(runtime),
      createDict(runtime),
    ];
    expect(values.map(booleanValue)).toEqual([false, false, false, false, false]);
    for (const value of values) releaseReference(value);
  });

  it('is true for non-zero and non-empty values and functions', () => {
    const { runtime } = setup();
    const values: TallowObject[] = [
      int(runtime, -1),
      str(runtime, '0'),
      createList(runtime, undefined, 1),
      createFunction(runtime, undefined, {}, {}),
    ];
    expect(values.map(booleanValue)).toEqual([true, true, true, true]);
    for (const value of values) releaseReference(value);
  });
});
