/**
 * Tallow Module
 * Exports the object model, its errors and configuration loading
 */

export * from './runtime/index.js';
export {
  ConcurrentModificationError,
  createError,
  InternalError,
  invariant,
  InvalidKeyError,
  OutOfMemoryError,
  RuntimeError,
  TallowError,
  type TallowErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  loadRuntimeConfig,
  parseRuntimeConfig,
  type RuntimeConfig,
} from './config.js';
