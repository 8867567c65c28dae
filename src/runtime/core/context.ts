/**
 * Runtime Context Factory
 *
 * Creates the runtime that owns the null singleton, the allocator and the
 * I/O callbacks. Public API for host applications.
 */

import { createHeap, type Allocator } from './heap.js';
import type {
  ObjectRuntime,
  PrintOptions,
  RuntimeCallbacks,
  RuntimeOptions,
} from './types.js';
import { OBJECT_KINDS, type TallowNull } from './values.js';

/** Lists of this many slots or more print one element per line */
export const DEFAULT_WRAP_THRESHOLD = 5;

const defaultCallbacks: RuntimeCallbacks = {
  onWrite: (text) => {
    process.stdout.write(text);
  },
  onDiagnostic: (error) => {
    console.error(`Error: ${error.message}`);
  },
};

class ObjectRuntimeImpl implements ObjectRuntime {
  readonly allocator: Allocator;
  readonly null: TallowNull;
  readonly callbacks: RuntimeCallbacks;
  readonly print: Required<PrintOptions>;

  private serial = 0;
  private readonly handles = new WeakMap<object, number>();
  private handleSerial = 0;

  constructor(options: RuntimeOptions) {
    this.allocator = options.allocator ?? createHeap(options.heap);
    this.callbacks = { ...defaultCallbacks, ...options.callbacks };
    this.print = {
      wrapThreshold: options.print?.wrapThreshold ?? DEFAULT_WRAP_THRESHOLD,
    };

    // Starts with one reference held by the runtime itself, so correct
    // reference counting never brings it to zero.
    this.null = {
      kind: OBJECT_KINDS.NULL,
      refCount: 1,
      id: this.nextId(),
      runtime: this,
      block: undefined,
    };
  }

  nextId(): number {
    return this.serial++;
  }

  handleId(handle: object): number {
    let id = this.handles.get(handle);
    if (id === undefined) {
      id = ++this.handleSerial;
      this.handles.set(handle, id);
    }
    return id;
  }
}

/**
 * Create an object runtime.
 * This is the main entry point for configuring the object model.
 */
export function createRuntime(options: RuntimeOptions = {}): ObjectRuntime {
  return new ObjectRuntimeImpl(options);
}
