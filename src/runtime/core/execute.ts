/**
 * Spec Evaluation
 *
 * Public API for evaluating specs against targets and registering types.
 */

import { RestructError } from '../../error-classes.js';
import { DEFAULT_ENGINE } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type { RegisterOptions, TypeKey } from './registry.js';
import { createRootScope } from './scope.js';
import type { EvaluateOptions } from './types.js';

/**
 * Evaluate a spec against a target.
 *
 * When `default` is given, errors matching `skipOn` (default:
 * RestructError) return the default instead. Without a default every
 * error propagates, whatever `skipOn` says.
 *
 * @example
 * evaluate({ a: { b: { c: 'd' } } }, 'a.b.c') // 'd'
 * evaluate({}, 'a', { default: null })         // null
 */
export function evaluate(
  target: unknown,
  spec: unknown,
  options: EvaluateOptions = {}
): unknown {
  const engine = options.engine ?? DEFAULT_ENGINE;
  const root = createRootScope(getEvaluator(engine), target, spec, options.vars);

  try {
    return root.evaluate(target, spec);
  } catch (error) {
    if (!('default' in options)) throw error;
    const skipOn = options.skipOn ?? [RestructError];
    if (!skipOn.some((kind) => error instanceof kind)) throw error;
    return options.default;
  }
}

/** Register a type on the shared engine */
export function register(type: TypeKey, options?: RegisterOptions): void {
  DEFAULT_ENGINE.registry.register(type, options);
}
