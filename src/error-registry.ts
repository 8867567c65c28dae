/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * - runtime: recoverable, reported to the caller
 * - internal: defect in the embedding or in the object model itself
 */
export type ErrorCategory = 'runtime' | 'internal';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TALLOW-{category}{3-digit} (e.g., TALLOW-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Runtime Errors (TALLOW-R0xx)
  {
    errorId: 'TALLOW-R001',
    category: 'runtime',
    description: 'Out of memory',
    messageTemplate: 'Out of memory in {operation}',
    cause:
      'The allocator refused a request while building or growing a value.',
    resolution:
      'Release unused values or raise the heap limit (heap.limitBytes).',
  },
  {
    errorId: 'TALLOW-R002',
    category: 'runtime',
    description: 'Invalid dictionary key type',
    messageTemplate: 'Cannot add type {kind} as dictionary key',
    cause: 'Only integer and string values can be dictionary keys.',
    resolution: 'Convert the key to an integer or a string before storing.',
  },
  {
    errorId: 'TALLOW-R003',
    category: 'runtime',
    description: 'Dictionary changed while iterating',
    messageTemplate: 'Dictionary changed while iterating',
    cause:
      'A new key was added to a dictionary after an iterator over it was started.',
    resolution:
      'Collect the keys to add and insert them after the iteration completes.',
  },
  {
    errorId: 'TALLOW-R004',
    category: 'runtime',
    description: 'get() on non-dictionary',
    messageTemplate: 'get() passed non-dictionary object of type {kind}',
    cause: 'The get built-in accepts only a dictionary or null.',
    resolution: 'Pass a dictionary (or null) as the first argument.',
  },
  {
    errorId: 'TALLOW-R005',
    category: 'runtime',
    description: 'Unknown built-in function',
    messageTemplate: 'Unknown function: {name}',
    cause: 'No built-in function is registered under this name.',
    resolution: 'Check the spelling or register the function first.',
  },
  {
    errorId: 'TALLOW-R006',
    category: 'runtime',
    description: 'Missing argument',
    messageTemplate: 'Function {name} expects argument {param}',
    cause: 'A declared parameter was not bound when the function was called.',
    resolution: 'Supply every declared parameter.',
  },
  {
    errorId: 'TALLOW-R007',
    category: 'runtime',
    description: 'Unconvertible host value',
    messageTemplate: 'Cannot convert host value {value} ({reason})',
    cause:
      'Host data contains a value with no object-model counterpart, such as a fractional number.',
    resolution: 'Convert the value to an integer, string, list or map first.',
  },
  {
    errorId: 'TALLOW-R008',
    category: 'runtime',
    description: 'Cyclic value',
    messageTemplate: 'Cannot convert cyclic {kind}',
    cause: 'The value contains itself, directly or through nested containers.',
    resolution: 'Break the cycle before converting.',
  },
  {
    errorId: 'TALLOW-R009',
    category: 'runtime',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration in {source}: {reason}',
    cause: 'The runtime configuration file has an unexpected shape.',
    resolution:
      'Use the keys heap.limitBytes and print.wrapThreshold with non-negative integers.',
  },

  // Internal Errors (TALLOW-I0xx)
  {
    errorId: 'TALLOW-I001',
    category: 'internal',
    description: 'Wrong operand kind',
    messageTemplate: '{operation} expects {expected}, got {actual}',
    cause: 'A kind-specific operation received a value of another kind.',
  },
  {
    errorId: 'TALLOW-I002',
    category: 'internal',
    description: 'Use of destroyed value',
    messageTemplate: '{operation} on a destroyed value',
    cause: 'A value was used after its last reference was released.',
  },
  {
    errorId: 'TALLOW-I003',
    category: 'internal',
    description: 'Reference count out of range',
    messageTemplate: '{operation} with reference count {refCount}',
    cause: 'References were added or released more often than owned.',
  },
  {
    errorId: 'TALLOW-I004',
    category: 'internal',
    description: 'Null released to zero',
    messageTemplate: 'Reference counting problem on null object',
    cause: 'The shared null value lost more references than were taken.',
  },
  {
    errorId: 'TALLOW-I005',
    category: 'internal',
    description: 'Heap corruption',
    messageTemplate: '{operation}: {reason}',
    cause: 'A heap block was freed twice or accounting went out of balance.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Cannot add type {kind} as dictionary key", { kind: "list" })
 * // Returns: "Cannot add type list as dictionary key"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i]!;

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
