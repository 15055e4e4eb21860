/**
 * Deferred Expressions
 *
 * `T` stands for "the eventual target". Each access returns a new frozen
 * expression holding its parent's operations plus one step, so a chain
 * such as `T.field('a').index(0).call()` can be built before any target
 * exists and replayed later by the evaluator.
 */

import { AccessError } from '../../error-classes.js';
import { formatValue } from './values.js';

export type DeferredOp =
  | { readonly kind: 'field'; readonly name: string }
  | { readonly kind: 'index'; readonly key: unknown }
  | { readonly kind: 'call'; readonly args: readonly unknown[] };

export class TExpr {
  readonly ops: readonly DeferredOp[];

  constructor(ops: readonly DeferredOp[] = []) {
    this.ops = Object.freeze([...ops]);
    Object.freeze(this);
  }

  /** Named field access (`T.name`) */
  field(name: string): TExpr {
    return new TExpr([...this.ops, { kind: 'field', name }]);
  }

  /** Keyed or indexed access (`T[key]`) */
  index(key: unknown): TExpr {
    return new TExpr([...this.ops, { kind: 'index', key }]);
  }

  /**
   * Invoke the current value. Arguments that are T expressions or
   * SubSpecs are evaluated against the top-level target first.
   */
  call(...args: unknown[]): TExpr {
    return new TExpr([...this.ops, { kind: 'call', args: Object.freeze(args) }]);
  }

  /** Drop the most recent access; a no-op on the root */
  ascend(): TExpr {
    if (this.ops.length === 0) return this;
    return new TExpr(this.ops.slice(0, -1));
  }

  get isRoot(): boolean {
    return this.ops.length === 0;
  }

  toString(): string {
    return formatOps(this.ops);
  }
}

/** The root deferred expression */
export const T = new TExpr();

function formatOp(op: DeferredOp): string {
  switch (op.kind) {
    case 'field':
      return `.${op.name}`;
    case 'index':
      return `[${formatValue(op.key)}]`;
    case 'call':
      return `(${op.args.map((arg) => formatValue(arg)).join(', ')})`;
  }
}

export function formatOps(ops: readonly DeferredOp[]): string {
  return `T${ops.map(formatOp).join('')}`;
}

/** AccessError for a failure at step `index` of a deferred expression */
export function stepAccessError(
  cause: unknown,
  ops: readonly DeferredOp[],
  index: number
): AccessError {
  const op = ops[index];
  return new AccessError({
    cause,
    parts: ops.slice(0, index),
    index,
    segment: op,
    segmentText: op ? formatOp(op) : formatOps([]),
    pathText: formatOps(ops.slice(0, index + 1)),
  });
}
