/**
 * InspectMixin: Instrumentation
 *
 * Handles Inspect wrappers and recursive instrumentation:
 * - Echo: path and target before, output after (via callbacks.onLog)
 * - Breakpoint: host hook called before evaluation
 * - Post-mortem: host hook called with the error before it propagates
 *
 * @internal
 */

import type { Scope } from '../../scope.js';
import type { Inspect } from '../../specs.js';
import { describeSpec, formatValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

/**
 * InspectMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: engine.callbacks
 *
 * Methods added:
 * - evaluateInspect(target, spec, scope) -> unknown
 * - instrument(target, spec, scope, inspector, run) -> unknown
 */
function createInspectMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class InspectEvaluator extends Base {
    /**
     * Evaluate the wrapped spec under the inspector.
     * A recursive inspector is handed to the wrapped frame so every
     * descendant step is instrumented as well.
     */
    evaluateInspect(target: unknown, spec: Inspect, scope: Scope): unknown {
      return this.instrument(target, spec.wrapped, scope, spec, () =>
        scope.evaluate(
          target,
          spec.wrapped,
          spec.recursive ? { inspector: spec } : {}
        )
      );
    }

    instrument(
      target: unknown,
      spec: unknown,
      scope: Scope,
      inspector: Inspect,
      run: () => unknown
    ): unknown {
      const log = this.engine.callbacks.onLog;
      if (inspector.echo) {
        log('---');
        log(`path:   ${formatValue([...scope.path(), describeSpec(spec)])}`);
        log(`target: ${formatValue(target)}`);
      }
      inspector.breakpoint?.(scope);

      let value: unknown;
      try {
        value = run();
      } catch (error) {
        inspector.postMortem?.(error, scope);
        throw error;
      }

      if (inspector.echo) {
        log(`output: ${formatValue(value)}`);
        log('---');
      }
      return value;
    }
  };
}

export const InspectMixin = createInspectMixin;
