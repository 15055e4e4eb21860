/**
 * Switch
 */

import { describe, expect, it } from 'vitest';
import {
  evaluate,
  Let,
  Literal,
  S,
  StructuralTypeError,
  Switch,
} from '../../src/index.js';

describe('Switch', () => {
  it('evaluates the value of the first key that succeeds', () => {
    const spec = new Switch([
      ['b', new Literal('has b')],
      ['a', new Literal('has a')],
    ]);
    expect(evaluate({ a: 1 }, spec)).toBe('has a');
  });

  it('accepts object and Map cases', () => {
    expect(evaluate({ a: 1 }, new Switch({ b: new Literal(1), a: new Literal(2) }))).toBe(2);
    expect(evaluate({ a: 1 }, new Switch(new Map([['a', 'a']])))).toBe(1);
  });

  it('evaluates the value spec against the target', () => {
    expect(evaluate({ type: 'x', name: 'n' }, new Switch([['type', 'name']]))).toBe('n');
  });

  it('lets the value see bindings made by its key', () => {
    const spec = new Switch([[new Let({ kind: 'type' }), S('kind')]]);
    expect(evaluate({ type: 'dog' }, spec)).toBe('dog');
  });

  it('propagates errors that are not engine errors', () => {
    const spec = new Switch([
      [
        () => {
          throw new RangeError('bad');
        },
        'a',
      ],
    ]);
    expect(() => evaluate({ a: 1 }, spec)).toThrow(RangeError);
  });

  it('returns the default when nothing matches', () => {
    expect(evaluate({}, new Switch([['a', 'a']], { default: null }))).toBeNull();
  });

  it('fails when nothing matches and there is no default', () => {
    expect(() => evaluate({}, new Switch([['a', 'a']]))).toThrow(StructuralTypeError);
    expect(() => evaluate({}, new Switch([['a', 'a']]))).toThrow(
      'no matches for target in Switch([["a", "a"]])'
    );
  });

  it('requires at least one case', () => {
    expect(() => new Switch([])).toThrow('expected at least one case');
  });
});
