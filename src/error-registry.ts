/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'runtime' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: RS-{category}{3-digit} (e.g., RS-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error (max 200 characters) */
  readonly cause?: string | undefined;
  /** How to resolve this error (max 300 characters) */
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
  // Runtime Errors (RS-R0xx)
  {
    errorId: 'RS-R001',
    category: 'runtime',
    description: 'Access failed',
    messageTemplate:
      'could not access {segment}, index {index} in path {path}, got error: {error}',
    cause:
      'A key, index, field or deferred step could not be read from the current target.',
    resolution:
      'Check the target shape at the reported position, wrap the spec in a Coalesce, or pass a default to evaluate().',
  },
  {
    errorId: 'RS-R002',
    category: 'runtime',
    description: 'Target type not registered',
    messageTemplate:
      "target type {type} not registered for '{operation}', expected one of registered types: ({types}){at}",
    cause:
      'The type registry has no handler for the requested operation on the target type.',
    resolution:
      'Register the type with a read, iterate or write handler, or reshape the target before this step.',
  },
  {
    errorId: 'RS-R003',
    category: 'runtime',
    description: 'Registry is empty',
    messageTemplate:
      'evaluate() called without registering any types, see register() or createEngine() for details',
    cause: 'The engine was created with registerDefaultTypes: false and nothing was registered.',
    resolution: 'Register the target types the specs operate on.',
  },
  {
    errorId: 'RS-R004',
    category: 'runtime',
    description: 'Fallback exhausted',
    messageTemplate: 'no valid values found. Tried ({specs}) and got ({skipped}){details}',
    cause: 'Every alternative of a Coalesce raised a skippable error or produced a skipped value.',
    resolution: 'Add another alternative or configure a default on the Coalesce.',
  },
  {
    errorId: 'RS-R005',
    category: 'runtime',
    description: 'Unrecognized spec',
    messageTemplate:
      'expected spec to be a mapping, single-element array, pipeline, callable, string, or other specifier type, not: {spec}',
    cause: 'A value in spec position matches none of the recognized spec shapes.',
    resolution: 'Wrap constants in Literal, or use one of the spec constructors.',
  },
  {
    errorId: 'RS-R006',
    category: 'runtime',
    description: 'Invalid sequence template',
    messageTemplate:
      'sequence template must contain exactly one subspec, got {count}{at}',
    cause: 'An array in spec position does not hold exactly one element.',
    resolution: 'Use [subspec] to iterate, or pipe(...) to apply several specs in order.',
  },
  {
    errorId: 'RS-R007',
    category: 'runtime',
    description: 'Iteration failed',
    messageTemplate:
      'failed to iterate on instance of type {type}{at} (got {error})',
    cause: 'The iterate handler registered for the target type threw.',
    resolution: 'Check the iterate handler passed to register().',
  },
  {
    errorId: 'RS-R008',
    category: 'runtime',
    description: 'No switch case matched',
    messageTemplate: 'no matches for target in {spec}{at}',
    cause: 'Every key spec of a Switch raised an error and no default was configured.',
    resolution: 'Add a catch-all case or a default to the Switch.',
  },
  {
    errorId: 'RS-R009',
    category: 'runtime',
    description: 'Invalid call arguments',
    messageTemplate: 'expected {name} to resolve to {expected}, got {actual}{at}',
    cause: 'A Call whose args or kwargs are a spec produced a value of the wrong shape.',
    resolution: 'Make args resolve to an iterable and kwargs to an object.',
  },

  // Configuration Errors (RS-C0xx)
  {
    errorId: 'RS-C001',
    category: 'config',
    description: 'Registration cycle',
    messageTemplate:
      'cannot register {type}: it is both an ancestor and a descendant of registered type {other}',
    cause: 'Two type keys claim to be subtypes of each other.',
    resolution: 'Narrow the structural type so it does not accept its own ancestors.',
  },
  {
    errorId: 'RS-C002',
    category: 'config',
    description: 'Invalid registration target',
    messageTemplate: 'register expected a class or structural type, not: {value}',
    cause: 'register() was called with an instance or primitive instead of a type.',
    resolution: 'Pass the class itself (e.g. register(Date)) or a structural type.',
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
 * renderMessage("Expected {expected}, got {actual}", {expected: "string", actual: "number"})
 * // Returns: "Expected string, got number"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

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
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
