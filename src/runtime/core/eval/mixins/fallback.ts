/**
 * FallbackMixin: Coalesce
 *
 * Tries alternatives in order. An alternative is skipped when it throws
 * one of the configured error classes or, failing that, when its value
 * matches the skip policy.
 *
 * Error Handling:
 * - Non-skippable errors propagate unchanged
 * - Exhaustion without a default throws FallbackExhaustedError
 *
 * @internal
 */

import {
  FallbackExhaustedError,
  type SkippedEntry,
} from '../../../../error-classes.js';
import type { Scope } from '../../scope.js';
import type { Coalesce } from '../../specs.js';
import { formatValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createFallbackMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class FallbackEvaluator extends Base {
    evaluateCoalesce(target: unknown, spec: Coalesce, scope: Scope): unknown {
      const skipped: SkippedEntry[] = [];

      for (const subspec of spec.subspecs) {
        let value: unknown;
        try {
          value = scope.evaluate(target, subspec);
        } catch (error) {
          if (!spec.skipsError(error)) throw error;
          skipped.push({ kind: 'error', error });
          continue;
        }
        if (!spec.skipsValue(value)) return value;
        skipped.push({ kind: 'value', value });
      }

      if (spec.hasDefault) return spec.default;

      throw new FallbackExhaustedError({
        specs: spec.subspecs,
        skipped,
        path: scope.path(),
        skipText: spec.hasSkip ? formatValue(spec.skip) : undefined,
        skipOnText: spec.customSkipOn
          ? `[${spec.skipOn.map((kind) => kind.name).join(', ')}]`
          : undefined,
      });
    }
  };
}

export const FallbackMixin = createFallbackMixin;
