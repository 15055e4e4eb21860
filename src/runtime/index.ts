/**
 * Restruct Runtime
 *
 * Public API for evaluating specs against targets.
 *
 * Module Structure:
 * - core/: Essential evaluation engine
 *   - types.ts: Public types (Engine, EvaluateOptions, callbacks)
 *   - values.ts: Value formatting and comparison helpers
 *   - registry.ts: TypeRegistry and default type handlers
 *   - deferred.ts: T expression builder
 *   - specs.ts: Spec kinds (Literal, Path, Pipeline, Coalesce, ...)
 *   - scope.ts: Frame chain
 *   - context.ts: Engine factory
 *   - execute.ts: evaluate() and register()
 *   - trace.ts: Textual renderings of a frame chain
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Specifiers built on the Specifier extension point
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  Engine,
  EngineCallbacks,
  EngineOptions,
  ErrorClass,
  ErrorEvent,
  EvaluateOptions,
  FrameInit,
  ModeHandler,
  ObservabilityCallbacks,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// REGISTRY
// ============================================================

export {
  type Constructor,
  type ForestDescription,
  type IterateHandler,
  type ReadHandler,
  type RegisterOptions,
  type RegistryOperation,
  type StructuralType,
  type TargetHandler,
  type TypeKey,
  type TypeRegistryOptions,
  type WriteHandler,
  ITERABLE,
  KeyNotFoundError,
  TypeRegistry,
  UNREGISTERED,
  isConstructor,
  readProperty,
  structuralType,
  typeKeyName,
  writeProperty,
} from './core/registry.js';

// ============================================================
// SPECS
// ============================================================

export { type DeferredOp, T, TExpr, formatOps } from './core/deferred.js';
export {
  type CallOptions,
  type CoalesceOptions,
  type InspectOptions,
  Call,
  Coalesce,
  Inspect,
  Literal,
  OMIT,
  Path,
  Pipeline,
  STOP,
  Specifier,
  SubSpec,
  pipe,
} from './core/specs.js';

// ============================================================
// SCOPE AND EVALUATION
// ============================================================

export {
  type ScopeMarker,
  ROOT,
  Scope,
  UP,
  UnboundKeyError,
  structuralMode,
} from './core/scope.js';
export { DEFAULT_ENGINE, createEngine } from './core/context.js';
export { evaluate, register } from './core/execute.js';
export { lineStack, shortStack, tallStack } from './core/trace.js';

// ============================================================
// VALUE HELPERS
// ============================================================

export {
  type Callable,
  type PathSegment,
  deepEquals,
  formatValue,
  typeName,
} from './core/values.js';

// ============================================================
// EXTENSIONS
// ============================================================

export {
  type SwitchCase,
  type SwitchCases,
  type SwitchOptions,
  Switch,
} from './ext/control-flow.js';
export { Template, templateMode } from './ext/template.js';
export { type LetOptions, Let, S, ScopeVariable } from './ext/variables.js';
export { type AssignPath, Assign, assign } from './ext/mutation.js';
export { type FlattenOptions, Flatten, Fold, Sum } from './ext/reduction.js';
