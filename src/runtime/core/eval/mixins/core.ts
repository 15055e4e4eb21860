/**
 * CoreMixin: Step and Dispatch
 *
 * Provides the recursive step and the structural dispatch table.
 * Each step runs in a fresh child frame and is checked in order for:
 * an Inspect wrapper, an inherited recursive inspector, a non-structural
 * mode, and finally the spec's shape.
 *
 * Dispatch priority (first match wins):
 * mapping, sequence template, pipeline, T expression, Call, function,
 * path, Coalesce, Literal, SubSpec, Specifier.
 *
 * @internal
 */

import { StructuralTypeError } from '../../../../error-classes.js';
import { TExpr } from '../../deferred.js';
import { structuralMode, type Scope } from '../../scope.js';
import {
  Call,
  Coalesce,
  Inspect,
  isMappingSpec,
  Literal,
  Path,
  Pipeline,
  Specifier,
  SubSpec,
} from '../../specs.js';
import type { FrameInit, StepResult } from '../../types.js';
import { formatValue, isCallable } from '../../values.js';
import type { EvaluatorConstructor, SpecEvaluators } from '../types.js';

/** Errors already passed to onError, so each is reported once */
const reportedErrors = new WeakSet<object>();

/**
 * CoreMixin implementation. Outermost layer of the composed Evaluator.
 *
 * Depends on:
 * - InspectMixin: evaluateInspect(), instrument()
 * - CollectionsMixin: evaluateMapping(), evaluateSequence(), evaluatePipeline()
 * - AccessMixin: evaluatePath(), evaluateDeferred()
 * - FallbackMixin: evaluateCoalesce()
 * - CallsMixin: evaluateCall(), evaluateCallable(), evaluateSpecifier()
 *
 * Methods added:
 * - step(target, spec, parent, init?) -> StepResult
 * - evaluateFrame(target, spec, frame) -> unknown
 * - dispatch(target, spec, scope) -> unknown
 */
function createCoreMixin<TBase extends EvaluatorConstructor<SpecEvaluators>>(
  Base: TBase
) {
  return class CoreEvaluator extends Base {
    /**
     * Evaluate `spec` against `target` in a new child frame of `parent`.
     * Engine errors record the frame they were raised in.
     */
    step(
      target: unknown,
      spec: unknown,
      parent: Scope,
      init?: FrameInit
    ): StepResult {
      const frame = parent.child(target, spec, init);
      parent.lastChild = frame;

      const observability = this.engine.observability;
      const startTime = Date.now();
      observability.onStepStart?.({
        path: frame.path(),
        depth: frame.depth,
        target,
        spec,
      });

      let value: unknown;
      try {
        value = this.evaluateFrame(target, spec, frame);
      } catch (error) {
        this.attachScope(error, frame);
        this.reportError(error, frame);
        throw error;
      }

      observability.onStepEnd?.({
        path: frame.path(),
        depth: frame.depth,
        value,
        durationMs: Date.now() - startTime,
      });
      return { value, frame };
    }

    reportError(error: unknown, frame: Scope): void {
      const onError = this.engine.observability.onError;
      if (!onError) return;
      if (typeof error === 'object' && error !== null) {
        if (reportedErrors.has(error)) return;
        reportedErrors.add(error);
      }
      onError({ error, path: frame.path(), depth: frame.depth });
    }

    evaluateFrame(target: unknown, spec: unknown, frame: Scope): unknown {
      if (spec instanceof Inspect) {
        return this.evaluateInspect(target, spec, frame);
      }

      const inspector = frame.parent?.inspector;
      if (inspector) {
        return this.instrument(target, spec, frame, inspector, () =>
          this.applyMode(target, spec, frame)
        );
      }
      return this.applyMode(target, spec, frame);
    }

    /** Hand the step to the frame's mode unless it is the structural one */
    applyMode(target: unknown, spec: unknown, frame: Scope): unknown {
      if (frame.mode !== structuralMode) {
        return frame.mode(target, spec, frame);
      }
      return this.dispatch(target, spec, frame);
    }

    dispatch(target: unknown, spec: unknown, scope: Scope): unknown {
      if (isMappingSpec(spec)) {
        return this.evaluateMapping(target, spec, scope);
      }
      if (Array.isArray(spec)) {
        return this.evaluateSequence(target, spec, scope);
      }
      if (spec instanceof Pipeline) {
        return this.evaluatePipeline(target, spec, scope);
      }
      if (spec instanceof TExpr) {
        return this.evaluateDeferred(target, spec, scope);
      }
      if (spec instanceof Call) {
        return this.evaluateCall(target, spec, scope);
      }
      if (isCallable(spec)) {
        return this.evaluateCallable(target, spec);
      }
      if (typeof spec === 'string' || spec instanceof Path) {
        return this.evaluatePath(target, spec, scope);
      }
      if (spec instanceof Coalesce) {
        return this.evaluateCoalesce(target, spec, scope);
      }
      if (spec instanceof Literal) {
        return spec.value;
      }
      if (spec instanceof SubSpec) {
        return scope.evaluate(target, spec.value);
      }
      if (spec instanceof Specifier) {
        return this.evaluateSpecifier(target, spec, scope);
      }
      throw new StructuralTypeError('RS-R005', { spec: formatValue(spec) });
    }
  };
}

export const CoreMixin = createCoreMixin;
