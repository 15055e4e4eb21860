/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides engine access and shared helpers for all mixins.
 *
 * @internal
 */

import { RestructError } from '../../../error-classes.js';
import { TExpr } from '../deferred.js';
import type { Scope } from '../scope.js';
import { SubSpec } from '../specs.js';
import type { Engine, FrameInit, StepResult } from '../types.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 */
export class EvaluatorBase {
  constructor(readonly engine: Engine) {}

  /**
   * Resolve a call argument or index key. T expressions and SubSpecs are
   * evaluated against `target`; anything else is a literal.
   */
  resolveArgument(target: unknown, arg: unknown, scope: Scope): unknown {
    if (arg instanceof TExpr || arg instanceof SubSpec) {
      return scope.evaluate(target, arg);
    }
    return arg;
  }

  /** Record the innermost frame on engine errors that have none yet */
  attachScope(error: unknown, scope: Scope): void {
    if (error instanceof RestructError && error.scope === undefined) {
      error.scope = scope;
    }
  }

  /**
   * Evaluate a spec in a child frame of `parent`.
   *
   * NOTE: Stub implementation - actual implementation lives in CoreMixin,
   * which is the outermost layer of the composed Evaluator.
   */
  step(
    _target: unknown,
    _spec: unknown,
    _parent: Scope,
    _init?: FrameInit
  ): StepResult {
    throw new Error('step requires full Evaluator composition with CoreMixin');
  }

  /**
   * Structural dispatch within an existing frame.
   *
   * NOTE: Stub implementation - see step().
   */
  dispatch(_target: unknown, _spec: unknown, _scope: Scope): unknown {
    throw new Error('dispatch requires full Evaluator composition with CoreMixin');
  }
}
