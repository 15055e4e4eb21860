/**
 * Scope variables: Let binds, S reads
 */

import { AccessError } from '../../error-classes.js';
import { T } from '../core/deferred.js';
import {
  ROOT,
  UnboundKeyError,
  UP,
  type Scope,
  type ScopeMarker,
} from '../core/scope.js';
import { Specifier } from '../core/specs.js';
import { formatValue } from '../core/values.js';

export interface LetOptions {
  /** Frame that receives the bindings (default: UP, the enclosing frame) */
  at?: ScopeMarker;
}

/**
 * Evaluate each binding against the target and store the result on the
 * enclosing frame, so later siblings can read it with S. With
 * `{ at: ROOT }` the bindings are visible to the whole evaluation. A
 * single name binds the target itself. Returns the target unchanged.
 *
 * @example
 * evaluate({ a: 1 }, pipe(new Let({ x: 'a' }), S('x'))) // 1
 * evaluate({ a: 1 }, pipe('a', new Let('n'), S('n'))) // 1
 */
export class Let extends Specifier {
  readonly bindings: Readonly<Record<string, unknown>>;
  readonly at: ScopeMarker;

  constructor(bindings: string | Record<string, unknown>, options: LetOptions = {}) {
    super();
    this.bindings =
      typeof bindings === 'string' ? { [bindings]: T } : { ...bindings };
    this.at = options.at ?? UP;
  }

  apply(target: unknown, scope: Scope): unknown {
    for (const [name, spec] of Object.entries(this.bindings)) {
      scope.set(name, scope.evaluate(target, spec), this.at);
    }
    return target;
  }

  toString(): string {
    const entries = Object.entries(this.bindings).map(
      ([name, spec]) => `${name}=${formatValue(spec)}`
    );
    if (this.at === ROOT) entries.push('at=ROOT');
    return `Let(${entries.join(', ')})`;
  }
}

/** Reads a variable visible from the current frame */
export class ScopeVariable extends Specifier {
  constructor(readonly name: string) {
    super();
  }

  apply(_target: unknown, scope: Scope): unknown {
    if (!scope.has(this.name)) {
      const text = formatValue(this.name);
      throw new AccessError({
        cause: new UnboundKeyError(this.name),
        parts: [],
        index: 0,
        segment: this.name,
        segmentText: text,
        pathText: `S[${text}]`,
      });
    }
    return scope.get(this.name);
  }

  toString(): string {
    return `S[${formatValue(this.name)}]`;
  }
}

export function S(name: string): ScopeVariable {
  return new ScopeVariable(name);
}
