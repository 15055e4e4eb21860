/**
 * AccessMixin: path specs and deferred expressions
 *
 * Handles key-by-key access through the registry read handler:
 * - Path: dotted strings (split on '.') and explicit Path key lists
 * - Deferred: replay of T field/index/call steps
 *
 * Error Handling:
 * - Read handler failures throw AccessError with the failing position
 * - Missing read handlers throw UnregisteredOperationError('read')
 * - Exceptions from functions invoked by a call step propagate unwrapped
 *
 * @internal
 */

import { AccessError } from '../../../../error-classes.js';
import { stepAccessError, type TExpr } from '../../deferred.js';
import { requireReader } from '../../handlers.js';
import type { Scope } from '../../scope.js';
import type { Path } from '../../specs.js';
import { typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

/**
 * AccessMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: resolveArgument()
 * - handlers: requireReader()
 *
 * Methods added:
 * - evaluatePath(target, spec, scope) -> unknown
 * - evaluateDeferred(target, spec, scope) -> unknown
 */
function createAccessMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class AccessEvaluator extends Base {
    /**
     * Resolve each key in turn. Errors report the full path (frame path
     * followed by the keys) and the failing key's position in it.
     */
    evaluatePath(target: unknown, spec: string | Path, scope: Scope): unknown {
      const keys: readonly unknown[] =
        typeof spec === 'string' ? spec.split('.') : spec.keys;

      let current = target;
      for (const [i, key] of keys.entries()) {
        const read = requireReader(scope, current);
        try {
          current = read(current, key);
        } catch (error) {
          const prefix = scope.path();
          throw AccessError.forKeys(error, [...prefix, ...keys], prefix.length + i);
        }
      }
      return current;
    }

    /**
     * Replay a T expression. Call steps bind `this` to the value the
     * callee was read from.
     */
    evaluateDeferred(target: unknown, spec: TExpr, scope: Scope): unknown {
      const ops = spec.ops;
      let current = target;
      let receiver: unknown = undefined;

      for (const [i, op] of ops.entries()) {
        if (op.kind === 'call') {
          if (typeof current !== 'function') {
            throw stepAccessError(
              new TypeError(`${typeName(current)} is not callable`),
              ops,
              i
            );
          }
          const args = op.args.map((arg) =>
            this.resolveArgument(target, arg, scope)
          );
          current = Reflect.apply(current, receiver, args);
          receiver = undefined;
          continue;
        }

        const key =
          op.kind === 'field'
            ? op.name
            : this.resolveArgument(target, op.key, scope);
        const read = requireReader(scope, current);
        let next: unknown;
        try {
          next = read(current, key);
        } catch (error) {
          throw stepAccessError(error, ops, i);
        }
        receiver = current;
        current = next;
      }
      return current;
    }
  };
}

export const AccessMixin = createAccessMixin;
