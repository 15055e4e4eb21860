/**
 * Reductions over iterable targets
 */

import { StructuralTypeError } from '../../error-classes.js';
import { TExpr, T } from '../core/deferred.js';
import { requireIterator } from '../core/handlers.js';
import type { Scope } from '../core/scope.js';
import { Specifier } from '../core/specs.js';
import {
  formatAt,
  formatCall,
  formatValue,
  isIterable,
  typeName,
} from '../core/values.js';

function iterationError(
  source: unknown,
  scope: Scope,
  error: unknown
): StructuralTypeError {
  return new StructuralTypeError(
    'RS-R007',
    {
      type: typeName(source),
      at: formatAt(scope.path()),
      error: formatValue(error),
    },
    { cause: error }
  );
}

/**
 * In-place add: numbers sum, strings concatenate, arrays are extended
 * with the item's elements.
 */
function addInPlace(accumulator: unknown, item: unknown): unknown {
  if (typeof accumulator === 'number' && typeof item === 'number') {
    return accumulator + item;
  }
  if (typeof accumulator === 'string' && typeof item === 'string') {
    return accumulator + item;
  }
  if (Array.isArray(accumulator) && isIterable(item)) {
    accumulator.push(...item);
    return accumulator;
  }
  throw new TypeError(`cannot add ${typeName(item)} to ${typeName(accumulator)}`);
}

/**
 * Evaluate `subspec` (the target itself when it is T), iterate the result
 * through the registry and fold it with `op`, starting from `init()`.
 * Without `op` values are added in place (see addInPlace).
 *
 * @example
 * evaluate({ a: [1, 2] }, new Fold('a', () => 10, (acc, n) => acc + Number(n))) // 13
 * evaluate({ a: ['x', 'y'] }, new Fold('a', () => '')) // 'xy'
 */
export class Fold<TAcc = unknown> extends Specifier {
  constructor(
    readonly subspec: unknown,
    readonly init: () => TAcc,
    readonly op?: (accumulator: TAcc, item: unknown) => TAcc
  ) {
    super();
    if (typeof init !== 'function') {
      throw new TypeError(`expected init to be a function, got ${typeName(init)}`);
    }
    if (op !== undefined && typeof op !== 'function') {
      throw new TypeError(`expected op to be a function, got ${typeName(op)}`);
    }
  }

  apply(target: unknown, scope: Scope): unknown {
    const source = this.source(target, scope);
    const iterator = this.iterate(source, scope);
    return this.op === undefined
      ? this.reduce<unknown>(source, iterator, scope, this.init(), addInPlace)
      : this.reduce(source, iterator, scope, this.init(), this.op);
  }

  /** The value to reduce: the target for bare T, else the evaluated subspec */
  protected source(target: unknown, scope: Scope): unknown {
    return this.subspec instanceof TExpr && this.subspec.isRoot
      ? target
      : scope.evaluate(target, this.subspec);
  }

  protected iterate(source: unknown, scope: Scope): Iterator<unknown> {
    const iterate = requireIterator(scope, source);
    try {
      return iterate(source)[Symbol.iterator]();
    } catch (error) {
      throw iterationError(source, scope, error);
    }
  }

  private reduce<A>(
    source: unknown,
    iterator: Iterator<unknown>,
    scope: Scope,
    init: A,
    op: (accumulator: A, item: unknown) => A
  ): A {
    let accumulator = init;
    let finished = false;
    try {
      for (;;) {
        let next: IteratorResult<unknown>;
        try {
          next = iterator.next();
        } catch (error) {
          finished = true;
          throw iterationError(source, scope, error);
        }
        if (next.done) {
          finished = true;
          return accumulator;
        }
        accumulator = op(accumulator, next.value);
      }
    } finally {
      if (!finished) iterator.return?.();
    }
  }

  toString(): string {
    return formatCall(this.constructor.name, [this.subspec]);
  }
}

/** Numeric total of the iterated values, starting from 0 */
export class Sum extends Fold<number> {
  constructor(subspec: unknown = T) {
    super(
      subspec,
      () => 0,
      (total, item) => {
        if (typeof item !== 'number') {
          throw new TypeError(`cannot add ${typeName(item)} to a sum`);
        }
        return total + item;
      }
    );
  }
}

export interface FlattenOptions {
  /** Return an iterator over the items instead of an array */
  lazy?: boolean;
}

function* chainItems(iterator: Iterator<unknown>): Generator<unknown, void, undefined> {
  for (;;) {
    const next = iterator.next();
    if (next.done) return;
    const item = next.value;
    if (!isIterable(item)) {
      throw new TypeError(`cannot flatten ${typeName(item)}`);
    }
    yield* item;
  }
}

/**
 * Concatenates iterable values into one array. With `{ lazy: true }` the
 * result is an iterator that walks the values as it is consumed; errors
 * then surface during consumption.
 */
export class Flatten extends Fold<unknown[]> {
  readonly lazy: boolean;

  constructor(subspec: unknown = T, options: FlattenOptions = {}) {
    super(
      subspec,
      () => [],
      (items, item) => {
        if (!isIterable(item)) {
          throw new TypeError(`cannot flatten ${typeName(item)}`);
        }
        items.push(...item);
        return items;
      }
    );
    this.lazy = options.lazy ?? false;
  }

  apply(target: unknown, scope: Scope): unknown {
    if (!this.lazy) return super.apply(target, scope);
    const source = this.source(target, scope);
    return chainItems(this.iterate(source, scope));
  }

  toString(): string {
    const base = formatCall('Flatten', [this.subspec]);
    return this.lazy ? `${base.slice(0, -1)}, lazy=true)` : base;
  }
}
