/**
 * Tracer: line, short and tall renderings of a frame chain
 */

import { describe, expect, it } from 'vitest';
import {
  evaluate,
  lineStack,
  pipe,
  RestructError,
  shortStack,
  T,
  tallStack,
  type Scope,
} from '../../src/index.js';

function failingScope(target: unknown, spec: unknown): Scope {
  try {
    evaluate(target, spec);
  } catch (error) {
    if (error instanceof RestructError && error.scope) return error.scope;
    throw error;
  }
  throw new Error('evaluation did not fail');
}

describe('lineStack', () => {
  it('shows spec types, target changes and path segments', () => {
    const scope = failingScope({ items: [{ a: 1 }, {}] }, pipe('items', ['a']));
    expect(lineStack(scope)).toBe('/Pipeline!Object/Array!Array<items>/String!Object<1>');
  });

  it('marks the target only when it changes', () => {
    const scope = failingScope({ a: {} }, { x: 'a.b' });
    expect(lineStack(scope)).toBe('/Object!Object/String');
  });

  it('shows T expressions literally', () => {
    const scope = failingScope({}, T.field('a'));
    expect(lineStack(scope)).toBe('/T.a!Object');
  });
});

describe('tallStack', () => {
  it('lists target and spec of every frame', () => {
    const scope = failingScope({ items: [{ a: 1 }, {}] }, pipe('items', ['a']));
    expect(tallStack(scope).split('\n')).toEqual([
      'target: {"items": [{"a": 1}, {}]}',
      'spec:   Pipeline("items", ["a"])',
      'target: [{"a": 1}, {}]',
      'spec:   ["a"]',
      'target: {}',
      'spec:   "a"',
    ]);
  });

  it('omits repeated targets', () => {
    const scope = failingScope({ a: {} }, { x: 'a.b' });
    expect(tallStack(scope)).toBe('target: {"a": {}}\nspec:   {"x": "a.b"}\nspec:   "a.b"');
  });
});

describe('shortStack', () => {
  it('truncates long values to the given width', () => {
    const scope = failingScope({ items: [{ a: 1 }, {}] }, pipe('items', ['a']));
    expect(shortStack(scope, 10).split('\n')).toEqual([
      'target: {"items...',
      'spec:   Pipelin...',
      'target: [{"a": ...',
      'spec:   ["a"]',
      'target: {}',
      'spec:   "a"',
    ]);
  });

  it('fills narrow widths with dots', () => {
    const scope = failingScope({ a: {} }, { x: 'a.b' });
    expect(shortStack(scope, 2).split('\n')).toEqual(['target: ..', 'spec:   ..', 'spec:   ..']);
  });

  it('keeps values within the default width', () => {
    const scope = failingScope({ a: {} }, { x: 'a.b' });
    expect(shortStack(scope)).toBe(tallStack(scope));
  });
});
