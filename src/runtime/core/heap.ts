/**
 * Heap Accounting
 *
 * The allocator seam of the object model. Every header, string buffer,
 * slot array, dictionary entry and dictionary iterator is charged to an
 * Allocator, which may refuse a request. The default allocator keeps live
 * block and byte counters so hosts and tests can detect leaks.
 */

import { invariant, OutOfMemoryError } from '../../error-classes.js';

/** Accounting size of a value header */
export const HEADER_SIZE = 32;
/** Accounting size of one list slot */
export const SLOT_SIZE = 8;
/** Accounting size of one dictionary entry */
export const DICT_ENTRY_SIZE = 40;
/** Accounting size of a dictionary iterator */
export const DICT_ITERATOR_SIZE = 16;

/** A block handed out by an allocator */
export interface HeapBlock {
  readonly serial: number;
  readonly size: number;
}

/** Allocation primitives; each may fail by returning undefined */
export interface Allocator {
  allocate(size: number): HeapBlock | undefined;
  /** On failure the original block stays valid and unchanged */
  reallocate(block: HeapBlock, size: number): HeapBlock | undefined;
  free(block: HeapBlock): void;
}

/** Counters maintained by the accounting heap */
export interface HeapStats {
  /** Blocks allocated and not yet freed */
  readonly liveBlocks: number;
  /** Bytes held by live blocks */
  readonly liveBytes: number;
  /** Highest liveBytes observed */
  readonly peakBytes: number;
  /** Successful allocate and reallocate calls */
  readonly totalAllocations: number;
  /** Refused requests */
  readonly failedAllocations: number;
}

export interface HeapOptions {
  /** Refuse requests that would push liveBytes above this limit */
  limitBytes?: number | undefined;
}

/** Allocator with leak accounting and an optional byte limit */
export class AccountingHeap implements Allocator {
  private readonly live = new Map<number, HeapBlock>();
  private nextSerial = 1;
  private liveBytes = 0;
  private peakBytes = 0;
  private totalAllocations = 0;
  private failedAllocations = 0;

  /** Byte limit; may be changed at any time to simulate exhaustion */
  limitBytes: number | undefined;

  constructor(options: HeapOptions = {}) {
    this.limitBytes = options.limitBytes;
  }

  allocate(size: number): HeapBlock | undefined {
    if (!this.fits(size)) {
      this.failedAllocations++;
      return undefined;
    }
    return this.track(size);
  }

  reallocate(block: HeapBlock, size: number): HeapBlock | undefined {
    invariant(this.live.has(block.serial), 'TALLOW-I005', {
      operation: 'reallocate',
      reason: `block ${block.serial} is not live`,
    });
    if (!this.fits(size - block.size)) {
      this.failedAllocations++;
      return undefined;
    }
    this.release(block);
    return this.track(size);
  }

  free(block: HeapBlock): void {
    invariant(this.live.has(block.serial), 'TALLOW-I005', {
      operation: 'free',
      reason: `block ${block.serial} is not live`,
    });
    this.release(block);
  }

  stats(): HeapStats {
    return {
      liveBlocks: this.live.size,
      liveBytes: this.liveBytes,
      peakBytes: this.peakBytes,
      totalAllocations: this.totalAllocations,
      failedAllocations: this.failedAllocations,
    };
  }

  private fits(extra: number): boolean {
    return (
      this.limitBytes === undefined ||
      this.liveBytes + extra <= this.limitBytes
    );
  }

  private track(size: number): HeapBlock {
    const block: HeapBlock = { serial: this.nextSerial++, size };
    this.live.set(block.serial, block);
    this.liveBytes += size;
    this.totalAllocations++;
    if (this.liveBytes > this.peakBytes) {
      this.peakBytes = this.liveBytes;
    }
    return block;
  }

  private release(block: HeapBlock): void {
    this.live.delete(block.serial);
    this.liveBytes -= block.size;
  }
}

/**
 * Allocate or throw OutOfMemoryError naming the operation that needed
 * the block.
 */
export function allocateBlock(
  allocator: Allocator,
  size: number,
  operation: string
): HeapBlock {
  const block = allocator.allocate(size);
  if (block === undefined) {
    throw new OutOfMemoryError(operation);
  }
  return block;
}

/** Create the default accounting allocator */
export function createHeap(options: HeapOptions = {}): AccountingHeap {
  return new AccountingHeap(options);
}
