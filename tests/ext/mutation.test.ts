/**
 * Assign and assign()
 */

import { describe, expect, it } from 'vitest';
import {
  AccessError,
  Assign,
  assign,
  createEngine,
  evaluate,
  Path,
  T,
  UnregisteredOperationError,
} from '../../src/index.js';

describe('Assign', () => {
  it('writes at a dotted path and returns the target', () => {
    const target = { a: { b: 1 } };
    expect(evaluate(target, new Assign('a.b', 2))).toBe(target);
    expect(target.a.b).toBe(2);
  });

  it('adds new keys', () => {
    const target: { a: Record<string, unknown> } = { a: {} };
    assign(target, 'a.c', 'new');
    expect(target.a).toEqual({ c: 'new' });
  });

  it('writes top-level keys', () => {
    expect(assign({}, 'x', 1)).toEqual({ x: 1 });
  });

  it('evaluates T and SubSpec values against the target', () => {
    const target = { a: 1, b: {} };
    assign(target, 'b.copy', T.field('a'));
    expect(target.b).toEqual({ copy: 1 });
  });

  it('writes other values literally', () => {
    expect(assign({ x: {} }, 'x.y', 'a.b')).toEqual({ x: { y: 'a.b' } });
  });

  it('writes array items and Map entries through the registry', () => {
    expect(assign({ list: [1, 2] }, new Path('list', 0), 9)).toEqual({ list: [9, 2] });

    const map = new Map<string, number>();
    assign({ m: map }, new Path('m', 'k'), 1);
    expect(map.get('k')).toBe(1);
  });

  it('accepts T paths', () => {
    expect(assign({ a: {} }, T.field('a').index('k'), 1)).toEqual({ a: { k: 1 } });
    expect(assign({ key: 'k', a: {} }, T.field('a').index(T.field('key')), 2)).toEqual({
      key: 'k',
      a: { k: 2 },
    });
  });

  it('reports failed writes as access errors', () => {
    try {
      assign({ list: [1] }, new Path('list', 5), 0);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AccessError);
      if (error instanceof AccessError) {
        expect(error.index).toBe(1);
        expect(error.cause).toBeInstanceOf(RangeError);
      }
    }
  });

  it('reports missing containers', () => {
    try {
      assign({}, 'a.b', 1);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AccessError);
      if (error instanceof AccessError) {
        expect(error.index).toBe(0);
        expect(error.parts).toEqual(['a']);
      }
    }
  });

  it('requires a write handler', () => {
    const engine = createEngine({ registerDefaultTypes: false });
    engine.registry.register(Object, { write: false });

    try {
      assign({ a: 1 }, 'b', 2, { engine });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(UnregisteredOperationError);
      if (error instanceof UnregisteredOperationError) {
        expect(error.operation).toBe('write');
        expect(error.message).toBe(
          "target type Object not registered for 'write', expected one of registered types: ()"
        );
      }
    }
  });

  it('validates the path', () => {
    expect(() => new Assign(new Path(), 1)).toThrow('path must have at least one key');
    expect(() => new Assign(T, 1)).toThrow('path must end with a field or index access, got T');
    expect(() => new Assign(T.field('f').call(), 1)).toThrow(
      'path must end with a field or index access, got T.f()'
    );
  });

  it('renders its path and value', () => {
    expect(String(new Assign('a.b', 1))).toBe('Assign("a.b", 1)');
  });
});
