/**
 * Template mode
 *
 * Under templateMode a spec is treated as data: containers are rebuilt
 * with their members evaluated, strings and other plain values are
 * returned as they are. T expressions and SubSpec switch back to
 * structural evaluation for their subtree.
 */

import { TExpr } from '../core/deferred.js';
import { structuralMode, type Scope } from '../core/scope.js';
import { Call, Coalesce, Literal, Specifier, SubSpec } from '../core/specs.js';
import type { ModeHandler } from '../core/types.js';
import { emptyMapLike, formatCall, isPlainObject } from '../core/values.js';

export const templateMode: ModeHandler = (target, spec, scope) => {
  if (spec instanceof TExpr) {
    return scope.evaluate(target, spec, { mode: structuralMode });
  }
  if (spec instanceof SubSpec) {
    return scope.evaluate(target, spec.value, { mode: structuralMode });
  }
  if (spec instanceof Literal) return spec.value;

  if (spec instanceof Map) {
    const result = emptyMapLike(spec);
    for (const [key, value] of spec) {
      result.set(scope.evaluate(target, key), scope.evaluate(target, value));
    }
    return result;
  }
  if (spec instanceof Set) {
    return new Set([...spec].map((item) => scope.evaluate(target, item)));
  }
  if (Array.isArray(spec)) {
    return spec.map((item) => scope.evaluate(target, item));
  }
  if (isPlainObject(spec)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(spec)) {
      result[key] = scope.evaluate(target, value);
    }
    return result;
  }

  if (typeof spec === 'function') return Reflect.apply(spec, undefined, [target]);
  if (
    spec instanceof Specifier ||
    spec instanceof Coalesce ||
    spec instanceof Call
  ) {
    return scope.runtime.dispatch(target, spec, scope);
  }
  return spec;
};

/**
 * Evaluate `spec` in template mode.
 *
 * @example
 * evaluate({ a: 1 }, new Template({ kind: 'point', x: T.a })) // { kind: 'point', x: 1 }
 */
export class Template extends Specifier {
  constructor(readonly spec: unknown) {
    super();
  }

  apply(target: unknown, scope: Scope): unknown {
    return scope.evaluate(target, this.spec, { mode: templateMode });
  }

  toString(): string {
    return formatCall('Template', [this.spec]);
  }
}
