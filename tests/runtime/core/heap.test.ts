/**
 * Tallow Heap: allocator accounting and limits
 */

import { describe, expect, it } from 'vitest';
import { createHeap, InternalError } from '../../../src/index.js';

describe('AccountingHeap', () => {
  it('tracks live blocks and bytes', () => {
    const heap = createHeap();
    const a = heap.allocate(32);
    const b = heap.allocate(8);
    expect(a).toBeDefined();
    expect(b).toBeDefined();
    expect(heap.stats()).toEqual({
      liveBlocks: 2,
      liveBytes: 40,
      peakBytes: 40,
      totalAllocations: 2,
      failedAllocations: 0,
    });

    if (a !== undefined) heap.free(a);
    expect(heap.stats().liveBlocks).toBe(1);
    expect(heap.stats().liveBytes).toBe(8);
    expect(heap.stats().peakBytes).toBe(40);
  });

  it('refuses requests above the limit', () => {
    const heap = createHeap({ limitBytes: 64 });
    expect(heap.allocate(32)).toBeDefined();
    expect(heap.allocate(40)).toBeUndefined();
    expect(heap.allocate(32)).toBeDefined();
    expect(heap.stats().failedAllocations).toBe(1);
    expect(heap.stats().liveBytes).toBe(64);
  });

  it('charges only the growth of a reallocation against the limit', () => {
    const heap = createHeap({ limitBytes: 64 });
    const block = heap.allocate(32);
    if (block === undefined) throw new Error('allocation failed');

    const grown = heap.reallocate(block, 64);
    expect(grown?.size).toBe(64);
    expect(heap.stats().liveBlocks).toBe(1);
    expect(heap.stats().liveBytes).toBe(64);
  });

  it('keeps the original block when a reallocation is refused', () => {
    const heap = createHeap({ limitBytes: 48 });
    const block = heap.allocate(32);
    if (block === undefined) throw new Error('allocation failed');

    expect(heap.reallocate(block, 64)).toBeUndefined();
    expect(heap.stats().liveBytes).toBe(32);
    heap.free(block);
    expect(heap.stats().liveBlocks).toBe(0);
  });

  it('accepts a new limit at any time', () => {
    const heap = createHeap();
    heap.limitBytes = 0;
    expect(heap.allocate(1)).toBeUndefined();
    heap.limitBytes = undefined;
    expect(heap.allocate(1)).toBeDefined();
  });

  it('rejects freeing a block twice', () => {
    const heap = createHeap();
    const block = heap.allocate(16);
    if (block === undefined) throw new Error('allocation failed');

    heap.free(block);
    expect(() => heap.free(block)).toThrow(InternalError);
    expect(() => heap.free(block)).toThrow(
      `free: block ${block.serial} is not live`
    );
  });
});
