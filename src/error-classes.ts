/**
 * Tallow Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TallowErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with
 * context and returns the matching error class for its category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("TALLOW-R002", { kind: "list" })
 * // Creates RuntimeError: "Cannot add type list as dictionary key"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): TallowError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  if (definition.category === 'internal') {
    return new InternalError(errorId, context);
  }
  return new RuntimeError(errorId, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tallow errors.
 * Provides structured data for host applications to format as needed.
 */
export class TallowError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TallowErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'TallowError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TallowErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TallowErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Render the registry template for an error ID, validating its category */
function messageFor(
  errorId: string,
  category: 'runtime' | 'internal',
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/** Recoverable errors reported to the caller; object state stays intact */
export class RuntimeError extends TallowError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super({
      errorId,
      message: messageFor(errorId, 'runtime', context),
      context,
    });
    this.name = 'RuntimeError';
  }
}

/** Allocator refused a request */
export class OutOfMemoryError extends RuntimeError {
  readonly operation: string;

  constructor(operation: string) {
    super('TALLOW-R001', { operation });
    this.name = 'OutOfMemoryError';
    this.operation = operation;
  }
}

/** A dictionary key that is neither an integer nor a string */
export class InvalidKeyError extends RuntimeError {
  readonly kind: string;

  constructor(kind: string) {
    super('TALLOW-R002', { kind });
    this.name = 'InvalidKeyError';
    this.kind = kind;
  }
}

/** A dictionary gained a key while an iterator over it was live */
export class ConcurrentModificationError extends RuntimeError {
  readonly expectedGeneration: number;
  readonly actualGeneration: number;

  constructor(expectedGeneration: number, actualGeneration: number) {
    super('TALLOW-R003', { expectedGeneration, actualGeneration });
    this.name = 'ConcurrentModificationError';
    this.expectedGeneration = expectedGeneration;
    this.actualGeneration = actualGeneration;
  }
}

/**
 * Programming-error condition. Signals a defect in the embedding or in
 * the object model; the object graph may be inconsistent afterwards.
 */
export class InternalError extends TallowError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super({
      errorId,
      message: messageFor(errorId, 'internal', context),
      context,
    });
    this.name = 'InternalError';
  }
}

/** Throw an InternalError unless the condition holds */
export function invariant(
  condition: boolean,
  errorId: string,
  context: Record<string, unknown> = {}
): asserts condition {
  if (!condition) {
    throw new InternalError(errorId, context);
  }
}
