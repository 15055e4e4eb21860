/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per Engine.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Registry access and error helpers
 * 2. InspectMixin - Inspect wrappers and recursive instrumentation
 * 3. CollectionsMixin - Mappings, sequence templates, pipelines
 * 4. AccessMixin - Path specs and T expressions
 * 5. FallbackMixin - Coalesce
 * 6. CallsMixin - Call specs, functions, custom specifiers
 * 7. CoreMixin - Step and dispatch (outermost)
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { InspectMixin } from './mixins/inspect.js';
import { CollectionsMixin } from './mixins/collections.js';
import { AccessMixin } from './mixins/access.js';
import { FallbackMixin } from './mixins/fallback.js';
import { CallsMixin } from './mixins/calls.js';
import { CoreMixin } from './mixins/core.js';
import type { Engine } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = CoreMixin(
  CallsMixin(
    FallbackMixin(AccessMixin(CollectionsMixin(InspectMixin(EvaluatorBase))))
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Cache eviction happens automatically when the Engine is garbage
 * collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<Engine, Evaluator>();

/**
 * Get or create an evaluator instance for a given Engine.
 *
 * @internal
 */
export function getEvaluator(engine: Engine): Evaluator {
  let evaluator = evaluatorCache.get(engine);
  if (!evaluator) {
    evaluator = new Evaluator(engine);
    evaluatorCache.set(engine, evaluator);
  }
  return evaluator;
}
