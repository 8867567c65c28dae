/**
 * Runtime Types
 *
 * Public types for runtime configuration. These types are the primary
 * interface for host applications.
 */

import type { TallowError } from '../../error-classes.js';
import type { Allocator, HeapOptions } from './heap.js';
import type { TallowNull } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Receives text produced by the print built-in */
  onWrite: (text: string) => void;
  /** Receives recoverable errors as they are raised by dict operations */
  onDiagnostic: (error: TallowError) => void;
}

/** Printer formatting knobs */
export interface PrintOptions {
  /** Lists with at least this many slots break lines between elements */
  wrapThreshold?: number;
}

/** Options for creating a runtime */
export interface RuntimeOptions {
  /** Allocator to charge values to (default: a fresh accounting heap) */
  allocator?: Allocator;
  /** Options for the default heap; ignored when allocator is given */
  heap?: HeapOptions;
  /** Printer formatting */
  print?: PrintOptions;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
}

/**
 * Owner of everything that is shared between values of one runtime: the
 * null singleton, the allocator, the callbacks and identity counters.
 * Independent runtimes share nothing.
 */
export interface ObjectRuntime {
  readonly allocator: Allocator;
  /** The one null value of this runtime */
  readonly null: TallowNull;
  readonly callbacks: RuntimeCallbacks;
  readonly print: Required<PrintOptions>;
  /** Next value identity */
  nextId(): number;
  /** Stable small number naming a borrowed handle, for display */
  handleId(handle: object): number;
}
