/**
 * CollectionsMixin: mappings, sequence templates and pipelines
 *
 * Handles the composite spec shapes:
 * - Mapping: same-kind output, each value spec applied to the same target
 * - Sequence template: `[sub]` applied to every element the registry yields
 * - Pipeline: each step applied to the previous step's result
 *
 * Error Handling:
 * - Non-iterable targets throw UnregisteredOperationError('iterate')
 * - Iterate handler failures throw StructuralTypeError(RS-R007)
 * - Arrays of length other than one throw StructuralTypeError(RS-R006)
 *
 * @internal
 */

import { StructuralTypeError } from '../../../../error-classes.js';
import { requireIterator } from '../../handlers.js';
import type { Scope } from '../../scope.js';
import { OMIT, STOP, type Pipeline } from '../../specs.js';
import {
  describeSpec,
  emptyMapLike,
  formatAt,
  formatValue,
  typeName,
  type PathSegment,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

/**
 * CollectionsMixin implementation.
 *
 * Depends on:
 * - handlers: requireIterator()
 * - step() (from CoreMixin composition, through scope.evaluate)
 *
 * Methods added:
 * - evaluateMapping(target, spec, scope) -> object | Map
 * - evaluateSequence(target, spec, scope) -> unknown[]
 * - evaluatePipeline(target, spec, scope) -> unknown
 */
function createCollectionsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class CollectionsEvaluator extends Base {
    /**
     * Build a mapping of the spec's kind. Keys are literal; values are
     * evaluated in declaration order and OMIT drops the key.
     */
    evaluateMapping(
      target: unknown,
      spec: Record<string, unknown> | Map<unknown, unknown>,
      scope: Scope
    ): Record<string, unknown> | Map<unknown, unknown> {
      if (spec instanceof Map) {
        const result = emptyMapLike(spec);
        for (const [key, subspec] of spec) {
          const value = scope.evaluate(target, subspec);
          if (value !== OMIT) result.set(key, value);
        }
        return result;
      }

      const result: Record<string, unknown> =
        Object.getPrototypeOf(spec) === null ? Object.create(null) : {};
      for (const [key, subspec] of Object.entries(spec)) {
        const value = scope.evaluate(target, subspec);
        if (value !== OMIT) result[key] = value;
      }
      return result;
    }

    /**
     * Apply the single subspec to every element. Each element adds its
     * index to the path; OMIT drops the element and STOP ends iteration.
     */
    evaluateSequence(
      target: unknown,
      spec: readonly unknown[],
      scope: Scope
    ): unknown[] {
      if (spec.length !== 1) {
        throw new StructuralTypeError('RS-R006', {
          count: spec.length,
          at: formatAt(scope.path()),
        });
      }
      const subspec = spec[0];
      const iterate = requireIterator(scope, target);

      let iterator: Iterator<unknown>;
      try {
        iterator = iterate(target)[Symbol.iterator]();
      } catch (error) {
        throw this.iterationError(target, scope, error);
      }

      const results: unknown[] = [];
      let finished = false;
      try {
        for (let index = 0; ; index++) {
          let next: IteratorResult<unknown>;
          try {
            next = iterator.next();
          } catch (error) {
            finished = true;
            throw this.iterationError(target, scope, error);
          }
          if (next.done) {
            finished = true;
            break;
          }

          const value = scope.evaluate(next.value, subspec, {
            segments: [index],
          });
          if (value === OMIT) continue;
          if (value === STOP) break;
          results.push(value);
        }
      } finally {
        if (!finished) iterator.return?.();
      }
      return results;
    }

    iterationError(
      target: unknown,
      scope: Scope,
      error: unknown
    ): StructuralTypeError {
      return new StructuralTypeError(
        'RS-R007',
        {
          type: typeName(target),
          at: formatAt(scope.path()),
          error: formatValue(error),
        },
        { cause: error }
      );
    }

    /**
     * Feed each step's result to the next. Every step after a
     * non-template step carries that step's description in its path.
     */
    evaluatePipeline(target: unknown, spec: Pipeline, scope: Scope): unknown {
      let value = target;
      const segments: PathSegment[] = [];
      for (const step of spec.steps) {
        value = scope.evaluate(value, step, { segments: [...segments] });
        if (!Array.isArray(step)) segments.push(describeSpec(step));
      }
      return value;
    }
  };
}

export const CollectionsMixin = createCollectionsMixin;
