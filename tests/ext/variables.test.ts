/**
 * Let and S
 */

import { describe, expect, it } from 'vitest';
import {
  AccessError,
  evaluate,
  Let,
  pipe,
  ROOT,
  S,
  UnboundKeyError,
} from '../../src/index.js';

describe('Let', () => {
  it('returns the target unchanged', () => {
    const target = { a: 1 };
    expect(evaluate(target, new Let({ x: 'a' }))).toBe(target);
  });

  it('binds values for later siblings', () => {
    expect(evaluate({ a: 1 }, pipe(new Let({ x: 'a' }), S('x')))).toBe(1);
  });

  it('is visible from nested specs', () => {
    const target = { a: { b: 1 }, c: 2 };
    const spec = pipe(new Let({ top: 'c' }), 'a', { b: 'b', c: S('top') });
    expect(evaluate(target, spec)).toEqual({ b: 1, c: 2 });
  });

  it('keeps enclosing-frame bindings out of sibling mapping values', () => {
    const spec = { a: pipe(new Let({ x: 'v' }), 'v'), b: S('x') };
    expect(() => evaluate({ v: 1 }, spec)).toThrow(AccessError);
  });

  it('binds at the root when asked', () => {
    const spec = { a: pipe(new Let({ x: 'v' }, { at: ROOT }), 'v'), b: S('x') };
    expect(evaluate({ v: 1 }, spec)).toEqual({ a: 1, b: 1 });
  });

  it('binds the current target under a single name', () => {
    const target = { a: { b: 2 } };
    expect(evaluate(target, pipe('a', new Let('item'), 'b', S('item')))).toBe(target.a);
  });

  it('renders its bindings', () => {
    expect(String(new Let({ x: 'a', y: 'b' }))).toBe('Let(x="a", y="b")');
    expect(String(new Let('item'))).toBe('Let(item=T)');
    expect(String(new Let({ x: 'a' }, { at: ROOT }))).toBe('Let(x="a", at=ROOT)');
  });
});

describe('S', () => {
  it('reads variables passed to evaluate()', () => {
    expect(evaluate({}, S('x'), { vars: { x: 42 } })).toBe(42);
  });

  it('reports unbound names as access errors', () => {
    try {
      evaluate({}, S('missing'));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AccessError);
      if (error instanceof AccessError) {
        expect(error.cause).toBeInstanceOf(UnboundKeyError);
        expect(error.message).toBe(
          'could not access "missing", index 0 in path S["missing"], got error: UnboundKeyError("no variable bound to \\"missing\\"")'
        );
      }
    }
  });

  it('converts unbound names to the evaluate() default', () => {
    expect(evaluate({}, S('missing'), { default: 'none' })).toBe('none');
  });

  it('renders as a lookup', () => {
    expect(String(S('x'))).toBe('S["x"]');
  });
});
