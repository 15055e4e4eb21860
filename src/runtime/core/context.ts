/**
 * Engine Factory
 *
 * Creates and configures the engine shared by evaluations.
 * Public API for host applications.
 */

import { TypeRegistry } from './registry.js';
import type { Engine, EngineCallbacks, EngineOptions } from './types.js';

const defaultCallbacks: EngineCallbacks = {
  onLog: (message) => {
    console.log(message);
  },
};

/**
 * Create an engine: a type registry plus host callbacks.
 * This is the main entry point for configuring evaluation.
 */
export function createEngine(options: EngineOptions = {}): Engine {
  return {
    registry: new TypeRegistry({
      registerDefaultTypes: options.registerDefaultTypes ?? true,
    }),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
  };
}

/** Engine used by the module-level evaluate() and register() */
export const DEFAULT_ENGINE: Engine = createEngine();
