/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Defines the constructor types and constraints for the mixin pattern.
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type { TExpr } from '../deferred.js';
import type { Scope } from '../scope.js';
import type { Call, Coalesce, Inspect, Path, Pipeline, Specifier } from '../specs.js';
import type { Callable } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 * This is the input type for mixin functions.
 *
 * Note: `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard TypeScript
 * mixin pattern.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> = new (...args: any[]) => TBase;

/**
 * Methods the structural dispatcher relies on.
 * CoreMixin requires a base providing all of them.
 */
export interface SpecEvaluators extends EvaluatorBase {
  evaluateInspect(target: unknown, spec: Inspect, scope: Scope): unknown;
  instrument(
    target: unknown,
    spec: unknown,
    scope: Scope,
    inspector: Inspect,
    run: () => unknown
  ): unknown;
  evaluateMapping(
    target: unknown,
    spec: Record<string, unknown> | Map<unknown, unknown>,
    scope: Scope
  ): unknown;
  evaluateSequence(target: unknown, spec: readonly unknown[], scope: Scope): unknown[];
  evaluatePipeline(target: unknown, spec: Pipeline, scope: Scope): unknown;
  evaluateDeferred(target: unknown, spec: TExpr, scope: Scope): unknown;
  evaluatePath(target: unknown, spec: string | Path, scope: Scope): unknown;
  evaluateCall(target: unknown, spec: Call, scope: Scope): unknown;
  evaluateCallable(target: unknown, spec: Callable): unknown;
  evaluateCoalesce(target: unknown, spec: Coalesce, scope: Scope): unknown;
  evaluateSpecifier(target: unknown, spec: Specifier, scope: Scope): unknown;
}
