/**
 * CallsMixin: Call specs, plain functions and custom specifiers
 *
 * Interface requirements:
 * - evaluateCall(target, spec, scope) -> unknown
 * - evaluateCallable(target, fn) -> unknown
 * - evaluateSpecifier(target, spec, scope) -> unknown
 *
 * Error Handling:
 * - Args/kwargs specs resolving to the wrong shape throw StructuralTypeError(RS-R009)
 * - Exceptions thrown by user functions propagate unwrapped
 *
 * @internal
 */

import { StructuralTypeError } from '../../../../error-classes.js';
import type { Scope } from '../../scope.js';
import type { Call, Specifier } from '../../specs.js';
import {
  formatAt,
  type Callable,
  isIterable,
  isPlainObject,
  typeName,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

/**
 * CallsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: resolveArgument()
 *
 * Methods added:
 * - evaluateCall(target, spec, scope) -> unknown
 * - evaluateCallable(target, fn) -> unknown
 * - evaluateSpecifier(target, spec, scope) -> unknown
 * - callArguments(target, spec, scope) -> unknown[] (helper)
 */
function createCallsMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class CallsEvaluator extends Base {
    /**
     * Resolve the callee and its arguments against the target, then
     * invoke. Keyword arguments become a trailing object argument.
     */
    evaluateCall(target: unknown, spec: Call, scope: Scope): unknown {
      const func = this.resolveArgument(target, spec.func, scope);
      if (typeof func !== 'function') {
        throw new StructuralTypeError('RS-R009', {
          name: 'func',
          expected: 'a function',
          actual: typeName(func),
          at: formatAt(scope.path()),
        });
      }
      return Reflect.apply(func, undefined, this.callArguments(target, spec, scope));
    }

    callArguments(target: unknown, spec: Call, scope: Scope): unknown[] {
      let args: unknown[];
      if (Array.isArray(spec.args)) {
        args = spec.args.map((arg: unknown) =>
          this.resolveArgument(target, arg, scope)
        );
      } else {
        const resolved = this.resolveArgument(target, spec.args, scope);
        if (!isIterable(resolved)) {
          throw new StructuralTypeError('RS-R009', {
            name: 'args',
            expected: 'an iterable',
            actual: typeName(resolved),
            at: formatAt(scope.path()),
          });
        }
        args = [...resolved];
      }

      const kwargs = spec.kwargs;
      if (kwargs === undefined) return args;

      if (isPlainObject(kwargs)) {
        const resolved: Record<string, unknown> = {};
        for (const [name, value] of Object.entries(kwargs)) {
          resolved[name] = this.resolveArgument(target, value, scope);
        }
        args.push(resolved);
        return args;
      }

      const resolved = this.resolveArgument(target, kwargs, scope);
      if (!isPlainObject(resolved)) {
        throw new StructuralTypeError('RS-R009', {
          name: 'kwargs',
          expected: 'an object',
          actual: typeName(resolved),
          at: formatAt(scope.path()),
        });
      }
      args.push(resolved);
      return args;
    }

    /** Plain functions receive the target as their only argument */
    evaluateCallable(target: unknown, fn: Callable): unknown {
      return Reflect.apply(fn, undefined, [target]);
    }

    evaluateSpecifier(target: unknown, spec: Specifier, scope: Scope): unknown {
      return spec.apply(target, scope);
    }
  };
}

export const CallsMixin = createCallsMixin;
