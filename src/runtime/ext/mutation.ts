/**
 * Assign: in-place writes through the registry
 */

import { AccessError } from '../../error-classes.js';
import { stepAccessError, TExpr, type DeferredOp } from '../core/deferred.js';
import { evaluate } from '../core/execute.js';
import { requireWriter } from '../core/handlers.js';
import type { Scope } from '../core/scope.js';
import { Path, Specifier, SubSpec } from '../core/specs.js';
import type { EvaluateOptions } from '../core/types.js';
import { formatCall } from '../core/values.js';

export type AssignPath = string | Path | TExpr;

type Destination =
  | { readonly kind: 'keys'; readonly keys: readonly unknown[] }
  | { readonly kind: 'deferred'; readonly ops: readonly DeferredOp[] };

function isDynamic(value: unknown): value is TExpr | SubSpec {
  return value instanceof TExpr || value instanceof SubSpec;
}

/**
 * Write `value` at `path` inside the target and return the target.
 * Everything but the last access locates the container; the last access
 * is the key handed to the container's write handler. A value that is a
 * T expression or SubSpec is evaluated against the target first.
 *
 * @example
 * evaluate({ a: {} }, new Assign('a.b', 1)) // { a: { b: 1 } }
 */
export class Assign extends Specifier {
  readonly path: AssignPath;
  readonly value: unknown;
  private readonly destination: Destination;

  constructor(path: AssignPath, value: unknown) {
    super();
    if (typeof path === 'string') {
      this.destination = { kind: 'keys', keys: path.split('.') };
    } else if (path instanceof Path) {
      if (path.keys.length === 0) {
        throw new TypeError('path must have at least one key');
      }
      this.destination = { kind: 'keys', keys: path.keys };
    } else {
      const last = path.ops[path.ops.length - 1];
      if (!last || last.kind === 'call') {
        throw new TypeError(
          `path must end with a field or index access, got ${String(path)}`
        );
      }
      this.destination = { kind: 'deferred', ops: path.ops };
    }
    this.path = path;
    this.value = value;
  }

  apply(target: unknown, scope: Scope): unknown {
    const value = isDynamic(this.value)
      ? scope.evaluate(target, this.value)
      : this.value;

    const { container, key } = this.locate(target, scope);
    const write = requireWriter(scope, container);
    try {
      write(container, key, value);
    } catch (error) {
      throw this.writeError(error);
    }
    return target;
  }

  private locate(
    target: unknown,
    scope: Scope
  ): { container: unknown; key: unknown } {
    const destination = this.destination;
    if (destination.kind === 'keys') {
      const keys = destination.keys;
      return {
        container: scope.evaluate(target, new Path(...keys.slice(0, -1))),
        key: keys[keys.length - 1],
      };
    }

    const ops = destination.ops;
    const last = ops[ops.length - 1];
    let key: unknown = undefined;
    if (last?.kind === 'field') key = last.name;
    else if (last?.kind === 'index') {
      key = isDynamic(last.key) ? scope.evaluate(target, last.key) : last.key;
    }
    return {
      container: scope.evaluate(target, new TExpr(ops.slice(0, -1))),
      key,
    };
  }

  private writeError(error: unknown): AccessError {
    const destination = this.destination;
    if (destination.kind === 'keys') {
      return AccessError.forKeys(
        error,
        destination.keys,
        destination.keys.length - 1
      );
    }
    return stepAccessError(error, destination.ops, destination.ops.length - 1);
  }

  toString(): string {
    return formatCall('Assign', [this.path, this.value]);
  }
}

/**
 * Write `value` at `path` inside `target` and return `target`.
 *
 * @example
 * const config = { server: { port: 80 } };
 * assign(config, 'server.port', 8080); // config.server.port === 8080
 */
export function assign(
  target: unknown,
  path: AssignPath,
  value: unknown,
  options?: EvaluateOptions
): unknown {
  return evaluate(target, new Assign(path, value), options);
}
