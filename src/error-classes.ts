/**
 * Restruct Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';
import type { RegistryOperation } from './runtime/core/registry.js';
import type { Scope } from './runtime/core/scope.js';
import {
  formatAt,
  formatCall,
  formatValue,
  typeName,
  type PathSegment,
} from './runtime/core/values.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface RestructErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
  /** Evaluation path of the frame that raised the error */
  readonly path?: readonly PathSegment[] | undefined;
}

function lookupMessage(
  errorId: string,
  context: Record<string, unknown>,
  category?: ErrorCategory
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('RS-R006', { count: 2, at: '' })
 * // RestructError: "sequence template must contain exactly one subspec, got 2"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): RestructError {
  return new RestructError({
    errorId,
    message: lookupMessage(errorId, context),
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all engine errors.
 * Fallback composition and evaluate() defaults catch this kind.
 */
export class RestructError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;
  /** Frame that raised the error, filled in by the evaluator */
  scope: Scope | undefined;

  constructor(data: RestructErrorData, options?: ErrorOptions) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message, options);
    this.name = 'RestructError';
    this.errorId = data.errorId;
    this.context = data.context;
    this.scope = undefined;
  }

  /** Get structured error data for custom formatting */
  toData(): RestructErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
      path: this.scope?.path(),
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: RestructErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.name}: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

export interface AccessErrorInit {
  /** Low-level failure raised by the read handler */
  readonly cause: unknown;
  /** Key sequence (path specs) or operations before the failing step (T) */
  readonly parts: readonly unknown[];
  /** Zero-based position of the failing key or step */
  readonly index: number;
  /** The failing key or operation */
  readonly segment: unknown;
  /** Rendered form of the failing key or operation */
  readonly segmentText: string;
  /** Rendered form of the accessed path up to and including the failure */
  readonly pathText: string;
}

/**
 * A key, index, field or deferred step could not be resolved.
 * The original failure is kept as `cause`.
 */
export class AccessError extends RestructError {
  readonly parts: readonly unknown[];
  readonly index: number;
  readonly segment: unknown;

  constructor(init: AccessErrorInit) {
    const context = {
      segment: init.segmentText,
      index: init.index,
      path: init.pathText,
      error: formatValue(init.cause),
    };
    super(
      {
        errorId: 'RS-R001',
        message: lookupMessage('RS-R001', context),
        context,
      },
      { cause: init.cause }
    );
    this.name = 'AccessError';
    this.parts = init.parts;
    this.index = init.index;
    this.segment = init.segment;
  }

  /** Failure at key `index` of an explicit key sequence */
  static forKeys(
    cause: unknown,
    keys: readonly unknown[],
    index: number
  ): AccessError {
    return new AccessError({
      cause,
      parts: keys,
      index,
      segment: keys[index],
      segmentText: formatValue(keys[index]),
      pathText: formatCall('Path', keys),
    });
  }
}

export interface UnregisteredOperationInit {
  readonly operation: RegistryOperation;
  readonly target: unknown;
  /** Names of the registered types supporting the operation */
  readonly registeredTypes: readonly string[];
  /** Total number of registered types */
  readonly registrySize: number;
  readonly path: readonly PathSegment[];
}

/** The registry has no handler for an operation on the target's type */
export class UnregisteredOperationError extends RestructError {
  readonly operation: RegistryOperation;
  readonly targetType: string;
  readonly registeredTypes: readonly string[];
  readonly path: readonly PathSegment[];

  constructor(init: UnregisteredOperationInit) {
    const errorId = init.registrySize === 0 ? 'RS-R003' : 'RS-R002';
    const targetType = typeName(init.target);
    const context = {
      type: targetType,
      operation: init.operation,
      types: init.registeredTypes.join(', '),
      at: formatAt(init.path),
    };
    super({ errorId, message: lookupMessage(errorId, context), context });
    this.name = 'UnregisteredOperationError';
    this.operation = init.operation;
    this.targetType = targetType;
    this.registeredTypes = init.registeredTypes;
    this.path = init.path;
  }
}

/** One entry of a fallback's skip log */
export type SkippedEntry =
  | { readonly kind: 'error'; readonly error: unknown }
  | { readonly kind: 'value'; readonly value: unknown };

export interface FallbackExhaustedInit {
  readonly specs: readonly unknown[];
  readonly skipped: readonly SkippedEntry[];
  readonly path: readonly PathSegment[];
  /** Rendered skip policy, when one was configured */
  readonly skipText?: string | undefined;
  /** Rendered skipOn list, when it differs from the default */
  readonly skipOnText?: string | undefined;
}

function describeSkipped(entry: SkippedEntry): string {
  if (entry.kind === 'error') {
    return entry.error instanceof Error ? entry.error.name : typeName(entry.error);
  }
  return `<skipped ${typeName(entry.value)}>`;
}

/** Every alternative of a Coalesce failed or was skipped */
export class FallbackExhaustedError extends RestructError {
  /** Skipped values and errors, in alternative order */
  readonly skipped: readonly unknown[];
  readonly specs: readonly unknown[];
  readonly path: readonly PathSegment[];

  constructor(init: FallbackExhaustedInit) {
    let details = '';
    if (init.skipText !== undefined) details += `, skip set to ${init.skipText}`;
    if (init.skipOnText !== undefined) {
      details += `, skipOn set to ${init.skipOnText}`;
    }
    if (init.path.length > 0) details += ` (at path ${formatValue(init.path)})`;

    const context = {
      specs: init.specs.map((spec) => formatValue(spec)).join(', '),
      skipped: init.skipped.map(describeSkipped).join(', '),
      details,
    };
    super({
      errorId: 'RS-R004',
      message: lookupMessage('RS-R004', context),
      context,
    });
    this.name = 'FallbackExhaustedError';
    this.specs = init.specs;
    this.skipped = init.skipped.map((entry) =>
      entry.kind === 'error' ? entry.error : entry.value
    );
    this.path = init.path;
  }
}

/** A spec value does not have a shape the evaluator can apply */
export class StructuralTypeError extends RestructError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(
      {
        errorId,
        message: lookupMessage(errorId, context, 'runtime'),
        context,
      },
      options
    );
    this.name = 'StructuralTypeError';
  }
}

/** Invalid type registration */
export class RegistrationError extends RestructError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: lookupMessage(errorId, context, 'config'),
      context,
    });
    this.name = 'RegistrationError';
  }
}
