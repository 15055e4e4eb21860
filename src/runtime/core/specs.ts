/**
 * Spec Constructors
 *
 * Values in spec position are interpreted by shape. Strings, plain objects,
 * Maps, one-element arrays and functions need no wrapper; the classes below
 * cover everything else.
 */

import { RestructError } from '../../error-classes.js';
import type { Scope } from './scope.js';
import type { ErrorClass } from './types.js';
import { TExpr } from './deferred.js';
import { deepEquals, formatCall, formatValue, isPlainObject } from './values.js';

// ============================================================
// SENTINELS
// ============================================================

/** Result that drops the current mapping key or sequence element */
export const OMIT: unique symbol = Symbol('OMIT');

/** Result that ends the current sequence iteration */
export const STOP: unique symbol = Symbol('STOP');

/** Plain objects and Maps are mapping specs */
export function isMappingSpec(
  spec: unknown
): spec is Record<string, unknown> | Map<unknown, unknown> {
  return isPlainObject(spec) || spec instanceof Map;
}

// ============================================================
// WRAPPERS
// ============================================================

/** A constant returned as-is, never interpreted as a spec */
export class Literal {
  constructor(readonly value: unknown) {}

  toString(): string {
    return formatCall('Literal', [this.value]);
  }
}

/** Forces spec interpretation where a value would otherwise be literal */
export class SubSpec {
  constructor(readonly value: unknown) {}

  toString(): string {
    return formatCall('SubSpec', [this.value]);
  }
}

/**
 * Explicit key sequence. Unlike a dotted string, keys are never split,
 * so they may contain dots or be non-strings.
 */
export class Path {
  readonly keys: readonly unknown[];

  constructor(...keys: unknown[]) {
    this.keys = Object.freeze(keys);
  }

  /** Split a dotted string into keys */
  static fromText(text: string): Path {
    return new Path(...text.split('.'));
  }

  toString(): string {
    return formatCall('Path', this.keys);
  }
}

/** Specs applied in order, each to the previous result */
export class Pipeline {
  readonly steps: readonly unknown[];

  constructor(steps: readonly unknown[]) {
    this.steps = Object.freeze([...steps]);
  }

  toString(): string {
    return formatCall('Pipeline', this.steps);
  }
}

export function pipe(...steps: unknown[]): Pipeline {
  return new Pipeline(steps);
}

// ============================================================
// FALLBACK
// ============================================================

export interface CoalesceOptions {
  /** Returned when every alternative is skipped */
  readonly default?: unknown;
  /** Predicate, list of values, or single value marking results to skip */
  readonly skip?: unknown;
  /** Error classes treated as a skip (default: [RestructError]) */
  readonly skipOn?: readonly ErrorClass[] | undefined;
}

/**
 * Ordered alternatives: the first one that neither throws a skippable
 * error nor produces a skipped value wins.
 */
export class Coalesce {
  readonly subspecs: readonly unknown[];
  readonly hasDefault: boolean;
  readonly default: unknown;
  readonly hasSkip: boolean;
  readonly skip: unknown;
  readonly skipOn: readonly ErrorClass[];

  constructor(subspecs: readonly unknown[], options: CoalesceOptions = {}) {
    this.subspecs = Object.freeze([...subspecs]);
    this.hasDefault = 'default' in options;
    this.default = options.default;
    this.hasSkip = 'skip' in options;
    this.skip = options.skip;
    this.skipOn = options.skipOn ?? [RestructError];
  }

  /** Errors are checked before values */
  skipsError(error: unknown): boolean {
    return this.skipOn.some((kind) => error instanceof kind);
  }

  skipsValue(value: unknown): boolean {
    if (!this.hasSkip) return false;
    const skip = this.skip;
    if (typeof skip === 'function') return Boolean(skip(value));
    if (Array.isArray(skip)) return skip.some((item) => deepEquals(item, value));
    return deepEquals(skip, value);
  }

  /** Whether skipOn differs from the default */
  get customSkipOn(): boolean {
    return this.skipOn.length !== 1 || this.skipOn[0] !== RestructError;
  }

  toString(): string {
    return formatCall('Coalesce', this.subspecs);
  }
}

// ============================================================
// CALLS
// ============================================================

export interface CallOptions {
  /** Positional arguments: a list (elements may be specs) or a spec */
  readonly args?: unknown;
  /** Keyword arguments: an object (values may be specs) or a spec */
  readonly kwargs?: unknown;
}

function isDeferredSpec(value: unknown): boolean {
  return value instanceof TExpr || value instanceof SubSpec;
}

/**
 * Invoke a function with arguments resolved against the target.
 * Keyword arguments are passed as a trailing object.
 */
export class Call {
  readonly func: unknown;
  readonly args: unknown;
  readonly kwargs: unknown;

  constructor(func: unknown, options: CallOptions = {}) {
    if (typeof func !== 'function' && !isDeferredSpec(func)) {
      throw new TypeError(
        `expected func to be a function or T expression, not: ${formatValue(func)}`
      );
    }
    const args = options.args ?? [];
    if (!Array.isArray(args) && !isDeferredSpec(args)) {
      throw new TypeError(
        `expected args to be an array or spec, not: ${formatValue(args)}`
      );
    }
    const kwargs = options.kwargs;
    if (
      kwargs !== undefined &&
      !isPlainObject(kwargs) &&
      !isDeferredSpec(kwargs)
    ) {
      throw new TypeError(
        `expected kwargs to be an object or spec, not: ${formatValue(kwargs)}`
      );
    }
    this.func = func;
    this.args = args;
    this.kwargs = kwargs;
  }

  toString(): string {
    const parts: unknown[] = [this.func, this.args];
    if (this.kwargs !== undefined) parts.push(this.kwargs);
    return formatCall('Call', parts);
  }
}

// ============================================================
// INSTRUMENTATION
// ============================================================

export interface InspectOptions {
  /** Log path, target, spec and output (default: true) */
  readonly echo?: boolean | undefined;
  /** Instrument every descendant step as well */
  readonly recursive?: boolean | undefined;
  /** Called before the wrapped spec is evaluated */
  readonly breakpoint?: ((scope: Scope) => void) | undefined;
  /** Called with the error before it propagates */
  readonly postMortem?: ((error: unknown, scope: Scope) => void) | undefined;
}

/** Debugging wrapper around a spec */
export class Inspect {
  readonly wrapped: unknown;
  readonly echo: boolean;
  readonly recursive: boolean;
  readonly breakpoint: ((scope: Scope) => void) | undefined;
  readonly postMortem: ((error: unknown, scope: Scope) => void) | undefined;

  constructor(wrapped: unknown = new Path(), options: InspectOptions = {}) {
    this.wrapped = wrapped;
    this.echo = options.echo ?? true;
    this.recursive = options.recursive ?? false;
    this.breakpoint = options.breakpoint;
    this.postMortem = options.postMortem;
  }

  toString(): string {
    return '<INSPECT>';
  }
}

// ============================================================
// EXTENSION POINT
// ============================================================

/**
 * Base class for custom specs. The evaluator calls apply() for any
 * instance; sub-specs are evaluated through scope.evaluate().
 */
export abstract class Specifier {
  abstract apply(target: unknown, scope: Scope): unknown;

  toString(): string {
    return `${this.constructor.name}()`;
  }
}
