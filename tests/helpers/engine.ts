/**
 * Test utilities for restruct runtime tests
 */

import {
  createEngine,
  type Engine,
  type EngineOptions,
  type ErrorEvent,
  type ObservabilityCallbacks,
  type StepEndEvent,
  type StepStartEvent,
} from '../../src/index.js';

/** Engine whose Inspect output is captured instead of printed */
export function createLogCollector(options: EngineOptions = {}): {
  lines: string[];
  engine: Engine;
} {
  const lines: string[] = [];
  const engine = createEngine({
    ...options,
    callbacks: { onLog: (message) => lines.push(message) },
  });
  return { lines, engine };
}

export interface CollectedEvents {
  stepStart: StepStartEvent[];
  stepEnd: StepEndEvent[];
  error: ErrorEvent[];
}

/** Create event collector for observability tests */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = { stepStart: [], stepEnd: [], error: [] };
  return {
    events,
    callbacks: {
      onStepStart: (e) => events.stepStart.push(e),
      onStepEnd: (e) => events.stepEnd.push(e),
      onError: (e) => events.error.push(e),
    },
  };
}

/** Sample class hierarchy for registry resolution */
export class Animal {
  constructor(readonly name: string) {}

  describe(): string {
    return `animal ${this.name}`;
  }
}

export class Dog extends Animal {}

export class Puppy extends Dog {}

export class Cat extends Animal {}

/** Iterable that is neither an Array nor a Map */
export class Bag {
  constructor(private readonly items: readonly unknown[]) {}

  *[Symbol.iterator](): Iterator<unknown> {
    yield* this.items;
  }
}
