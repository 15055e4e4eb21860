/**
 * Scope Chain
 *
 * Every evaluation step runs in its own frame. Frames link to their
 * parent and carry the step's target and spec, the path segments the step
 * adds, the active mode, an optional recursive inspector and user variables.
 */

import type { TypeRegistry } from './registry.js';
import type { Inspect } from './specs.js';
import type {
  FrameInit,
  ModeHandler,
  ScopeRuntime,
  StepResult,
} from './types.js';
import type { PathSegment } from './values.js';

/** Write to the parent frame */
export const UP: unique symbol = Symbol('UP');

/** Write to the root frame */
export const ROOT: unique symbol = Symbol('ROOT');

export type ScopeMarker = typeof UP | typeof ROOT;

/** A variable lookup found no binding in any frame */
export class UnboundKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`no variable bound to ${JSON.stringify(key)}`);
    this.name = 'UnboundKeyError';
    this.key = key;
  }
}

/** Default mode: structural dispatch on the spec's shape */
export const structuralMode: ModeHandler = (target, spec, scope) =>
  scope.runtime.dispatch(target, spec, scope);

interface ScopeFields {
  readonly parent: Scope | undefined;
  readonly runtime: ScopeRuntime;
  readonly target: unknown;
  readonly spec: unknown;
  readonly segments: readonly PathSegment[];
  readonly mode: ModeHandler;
  readonly inspector: Inspect | undefined;
}

export class Scope {
  readonly parent: Scope | undefined;
  readonly runtime: ScopeRuntime;
  readonly target: unknown;
  readonly spec: unknown;
  readonly segments: readonly PathSegment[];
  readonly mode: ModeHandler;
  readonly inspector: Inspect | undefined;
  /** Most recent child frame created while evaluating this frame */
  lastChild: Scope | undefined;
  private readonly vars = new Map<string, unknown>();

  constructor(fields: ScopeFields) {
    this.parent = fields.parent;
    this.runtime = fields.runtime;
    this.target = fields.target;
    this.spec = fields.spec;
    this.segments = fields.segments;
    this.mode = fields.mode;
    this.inspector = fields.inspector;
    this.lastChild = undefined;
  }

  get root(): Scope {
    return this.parent ? this.parent.root : this;
  }

  get registry(): TypeRegistry {
    return this.runtime.engine.registry;
  }

  /** Number of frames above this one */
  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  /** Look a variable up, innermost frame first */
  get(name: string): unknown {
    for (let frame: Scope | undefined = this; frame; frame = frame.parent) {
      if (frame.vars.has(name)) return frame.vars.get(name);
    }
    throw new UnboundKeyError(name);
  }

  has(name: string): boolean {
    for (let frame: Scope | undefined = this; frame; frame = frame.parent) {
      if (frame.vars.has(name)) return true;
    }
    return false;
  }

  /** Bind a variable in this frame, its parent (UP) or the root (ROOT) */
  set(name: string, value: unknown, at?: ScopeMarker): void {
    let frame: Scope = this;
    if (at === UP) frame = this.parent ?? this;
    else if (at === ROOT) frame = this.root;
    frame.vars.set(name, value);
  }

  /** Variables bound in this frame only */
  ownVariables(): ReadonlyMap<string, unknown> {
    return this.vars;
  }

  /** Frames from this one outward to the root */
  chain(): Scope[] {
    const frames: Scope[] = [];
    for (let frame: Scope | undefined = this; frame; frame = frame.parent) {
      frames.push(frame);
    }
    return frames;
  }

  /** Path segments from the root down to this frame */
  path(): PathSegment[] {
    return this.chain()
      .reverse()
      .flatMap((frame) => frame.segments);
  }

  /** Create a child frame; mode and inspector are inherited */
  child(target: unknown, spec: unknown, init: FrameInit = {}): Scope {
    return new Scope({
      parent: this,
      runtime: this.runtime,
      target,
      spec,
      segments: init.segments ?? [],
      mode: init.mode ?? this.mode,
      inspector: init.inspector ?? this.inspector,
    });
  }

  /** Evaluate a spec in a new child frame */
  evaluate(target: unknown, spec: unknown, init?: FrameInit): unknown {
    return this.runtime.step(target, spec, this, init).value;
  }

  /**
   * Evaluate a spec and also return the child frame it ran in, so a
   * dependent sibling evaluation can continue from that frame.
   */
  evaluateWithFrame(
    target: unknown,
    spec: unknown,
    init?: FrameInit
  ): StepResult {
    return this.runtime.step(target, spec, this, init);
  }
}

/** Root frame of an evaluation */
export function createRootScope(
  runtime: ScopeRuntime,
  target: unknown,
  spec: unknown,
  vars: Record<string, unknown> = {}
): Scope {
  const scope = new Scope({
    parent: undefined,
    runtime,
    target,
    spec,
    segments: [],
    mode: structuralMode,
    inspector: undefined,
  });
  for (const [name, value] of Object.entries(vars)) {
    scope.set(name, value);
  }
  return scope;
}
