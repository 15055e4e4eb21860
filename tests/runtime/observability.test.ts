/**
 * Engine configuration and observability callbacks
 */

import { describe, expect, it } from 'vitest';
import {
  AccessError,
  createEngine,
  DEFAULT_ENGINE,
  evaluate,
  pipe,
  register,
  T,
} from '../../src/index.js';
import { Cat, createEventCollector } from '../helpers/engine.js';

describe('observability', () => {
  it('fires step start and end around every step', () => {
    const { events, callbacks } = createEventCollector();
    const engine = createEngine({ observability: callbacks });
    evaluate({ a: 1 }, { x: 'a' }, { engine });

    expect(events.stepStart.map((e) => e.spec)).toEqual([{ x: 'a' }, 'a']);
    expect(events.stepStart.map((e) => e.depth)).toEqual([1, 2]);
    expect(events.stepEnd.map((e) => e.value)).toEqual([1, { x: 1 }]);
    expect(events.stepEnd.every((e) => e.durationMs >= 0)).toBe(true);
    expect(events.error).toEqual([]);
  });

  it('reports the path of each step', () => {
    const { events, callbacks } = createEventCollector();
    const engine = createEngine({ observability: callbacks });
    evaluate({ items: [1] }, { n: pipe('items', [T]) }, { engine });

    expect(events.stepStart.map((e) => e.path)).toEqual([
      [],
      [],
      [],
      ['items'],
      ['items', 0],
    ]);
  });

  it('reports each error once, at the frame that raised it', () => {
    const { events, callbacks } = createEventCollector();
    const engine = createEngine({ observability: callbacks });

    expect(() => evaluate({}, { x: 'a' }, { engine })).toThrow(AccessError);
    expect(events.error).toHaveLength(1);
    expect(events.error[0]?.depth).toBe(2);
    expect(events.error[0]?.error).toBeInstanceOf(AccessError);
  });
});

describe('engines', () => {
  it('keep separate registries', () => {
    const first = createEngine();
    const second = createEngine();
    first.registry.register(Cat, { read: () => 'meow' });

    expect(evaluate(new Cat('c'), 'name', { engine: first })).toBe('meow');
    expect(evaluate(new Cat('c'), 'name', { engine: second })).toBe('c');
  });

  it('register() installs types on the shared engine', () => {
    class Token {
      constructor(readonly value: string) {}
    }
    register(Token, { read: (_target, key) => `${String(key)}!` });

    expect(DEFAULT_ENGINE.registry.types()).toContain('Token');
    expect(evaluate(new Token('t'), 'k')).toBe('k!');
  });

  it('log to console by default', () => {
    expect(typeof createEngine().callbacks.onLog).toBe('function');
  });
});
