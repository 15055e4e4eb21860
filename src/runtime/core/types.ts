/**
 * Runtime Types
 *
 * Public types for engine configuration and evaluation.
 * These types are the primary interface for host applications.
 */

import type { TypeRegistry } from './registry.js';
import type { Scope } from './scope.js';
import type { Inspect } from './specs.js';
import type { PathSegment } from './values.js';

/** Any Error class, usable with instanceof */
export type ErrorClass = new (...args: never[]) => Error;

/**
 * Interpretation strategy for specs.
 * The structural mode is the default; other modes receive every
 * (target, spec, scope) triple evaluated below the frame that set them.
 */
export type ModeHandler = (
  target: unknown,
  spec: unknown,
  scope: Scope
) => unknown;

/** I/O callbacks for engine operations */
export interface EngineCallbacks {
  /** Called with each line echoed by Inspect */
  onLog: (message: string) => void;
}

/** Observability callbacks for monitoring evaluation */
export interface ObservabilityCallbacks {
  /** Called before each evaluation step */
  onStepStart?: ((event: StepStartEvent) => void) | undefined;
  /** Called after each evaluation step succeeds */
  onStepEnd?: ((event: StepEndEvent) => void) | undefined;
  /** Called when a step fails */
  onError?: ((event: ErrorEvent) => void) | undefined;
}

/** Event emitted before a step evaluates */
export interface StepStartEvent {
  /** Evaluation path of the step */
  path: PathSegment[];
  /** Nesting depth (1 for the top-level spec) */
  depth: number;
  target: unknown;
  spec: unknown;
}

/** Event emitted after a step evaluates */
export interface StepEndEvent {
  path: PathSegment[];
  depth: number;
  /** Value produced by the step */
  value: unknown;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: unknown;
  /** Evaluation path of the failing step */
  path: PathSegment[];
  depth: number;
}

/** Registry plus host callbacks shared by every evaluation */
export interface Engine {
  readonly registry: TypeRegistry;
  readonly callbacks: EngineCallbacks;
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating an engine */
export interface EngineOptions {
  /** Seed the registry with Object, Map, Array and Iterable (default: true) */
  registerDefaultTypes?: boolean | undefined;
  /** I/O callbacks */
  callbacks?: Partial<EngineCallbacks> | undefined;
  /** Observability callbacks for monitoring evaluation */
  observability?: ObservabilityCallbacks | undefined;
}

/** Options for evaluate() */
export interface EvaluateOptions {
  /** Returned when evaluation throws one of `skipOn` */
  default?: unknown;
  /** Error classes converted to the default (default: [RestructError]) */
  skipOn?: readonly ErrorClass[] | undefined;
  /** Engine to evaluate with (default: the shared engine) */
  engine?: Engine | undefined;
  /** Variables bound in the root frame */
  vars?: Record<string, unknown> | undefined;
}

/** Per-frame state set when a child frame is created */
export interface FrameInit {
  /** Path segments contributed by the new frame */
  segments?: readonly PathSegment[] | undefined;
  /** Mode for the new frame and its descendants */
  mode?: ModeHandler | undefined;
  /** Recursive inspector for the new frame's descendants */
  inspector?: Inspect | undefined;
}

/** Result of one evaluation step together with the frame it ran in */
export interface StepResult {
  value: unknown;
  frame: Scope;
}

/**
 * Evaluator surface used by scopes.
 * @internal
 */
export interface ScopeRuntime {
  readonly engine: Engine;
  /** Evaluate `spec` in a new child frame of `parent` */
  step(
    target: unknown,
    spec: unknown,
    parent: Scope,
    init?: FrameInit
  ): StepResult;
  /** Structural dispatch of `spec` within an existing frame */
  dispatch(target: unknown, spec: unknown, scope: Scope): unknown;
}
