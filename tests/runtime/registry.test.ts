/**
 * Type registry: default handlers, subtype resolution, registration rules
 */

import { describe, expect, it } from 'vitest';
import {
  AccessError,
  createEngine,
  evaluate,
  KeyNotFoundError,
  Path,
  readProperty,
  RegistrationError,
  structuralType,
  TypeRegistry,
  UNREGISTERED,
  UnregisteredOperationError,
} from '../../src/index.js';
import { Animal, Bag, Cat, Dog, Puppy } from '../helpers/engine.js';

const readTag =
  (tag: string) =>
  (_target: unknown, key: unknown): unknown =>
    `${tag}:${String(key)}`;

describe('TypeRegistry', () => {
  describe('default types', () => {
    it('builds the Object > Iterable > Map, Array forest', () => {
      expect(new TypeRegistry().describeForest()).toEqual([
        {
          name: 'Object',
          children: [
            {
              name: 'Iterable',
              children: [
                { name: 'Map', children: [] },
                { name: 'Array', children: [] },
              ],
            },
          ],
        },
      ]);
    });

    it('lists types per operation', () => {
      const registry = new TypeRegistry();
      expect(registry.types()).toEqual(['Object', 'Map', 'Array', 'Iterable']);
      expect(registry.types('iterate')).toEqual(['Map', 'Array', 'Iterable']);
      expect(registry.types('write')).toEqual(['Object', 'Map', 'Array']);
    });

    it('reads plain objects with property access and no iteration', () => {
      const handler = new TypeRegistry().resolve({ a: 1 });
      expect(handler.read).toBe(readProperty);
      expect(handler.iterate).toBeUndefined();
    });

    it('iterates other iterables through the Iterable type', () => {
      const registry = new TypeRegistry();
      const iterate = registry.resolveOperation(new Set([1, 2]), 'iterate')?.iterate;
      expect(iterate).toBeDefined();
      expect([...(iterate?.(new Set([1, 2])) ?? [])]).toEqual([1, 2]);
      expect(registry.resolveOperation(new Bag([3]), 'iterate')).toBeDefined();
    });

    it('does not treat strings as iterable', () => {
      expect(() => evaluate('abc', ['length'])).toThrow(UnregisteredOperationError);
    });

    it('starts empty when default types are disabled', () => {
      const registry = new TypeRegistry({ registerDefaultTypes: false });
      expect(registry.size).toBe(0);
      expect(registry.resolve({})).toBe(UNREGISTERED);
    });

    it('reports an empty registry on evaluation', () => {
      const engine = createEngine({ registerDefaultTypes: false });
      expect(() => evaluate({ a: 1 }, 'a', { engine })).toThrow(
        'evaluate() called without registering any types, see register() or createEngine() for details'
      );
    });
  });

  describe('default handlers', () => {
    it('reads own keys of plain objects only', () => {
      expect(evaluate({ a: 1 }, 'a')).toBe(1);
      expect(() => evaluate({}, 'toString')).toThrow(AccessError);
    });

    it('reads inherited members of class instances', () => {
      const rex = new Dog('rex');
      expect(evaluate(rex, 'name')).toBe('rex');
      expect(evaluate(rex, 'describe')).toBe(Animal.prototype.describe);
    });

    it('indexes arrays with integers and integer strings', () => {
      expect(evaluate(['a', 'b', 'c'], '1')).toBe('b');
      expect(evaluate(['a', 'b', 'c'], '-1')).toBe('c');
      expect(evaluate(['a', 'b', 'c'], new Path(-3))).toBe('a');
      expect(evaluate(['a', 'b'], 'length')).toBe(2);
    });

    it('rejects out-of-range indexes', () => {
      try {
        evaluate(['a', 'b'], new Path(5));
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AccessError);
        if (error instanceof AccessError) {
          expect(error.cause).toBeInstanceOf(RangeError);
          expect(String(error.cause)).toBe(
            'RangeError: index 5 out of range for array of length 2'
          );
        }
      }
    });

    it('reads map entries before properties', () => {
      expect(evaluate(new Map([['a', 1]]), 'a')).toBe(1);
      expect(evaluate(new Map([[1, 'one']]), new Path(1))).toBe('one');
      expect(evaluate(new Map([['a', 1]]), 'size')).toBe(1);
    });

    it('reports missing keys with KeyNotFoundError', () => {
      try {
        evaluate({ a: {} }, 'a.b');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AccessError);
        if (error instanceof AccessError) {
          expect(error.cause).toBeInstanceOf(KeyNotFoundError);
          expect(error.index).toBe(1);
          expect(error.parts).toEqual(['a', 'b']);
        }
      }
    });

    it('resolves null targets to the Object handler', () => {
      try {
        evaluate(null, 'a');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AccessError);
        if (error instanceof AccessError) {
          expect(error.cause).toBeInstanceOf(TypeError);
          expect(error.message).toBe(
            'could not access "a", index 0 in path Path("a"), got error: TypeError("cannot read property \\"a\\" of null")'
          );
        }
      }
    });
  });

  describe('subtype resolution', () => {
    it('resolves subclasses to their registered ancestor', () => {
      const engine = createEngine();
      engine.registry.register(Animal, { read: readTag('animal') });

      expect(evaluate(new Dog('rex'), 'anything', { engine })).toBe(
        'animal:anything'
      );
      expect(engine.registry.describeForest()[0]?.children.map((c) => c.name)).toEqual(
        ['Iterable', 'Animal']
      );
    });

    it('prefers the deepest registered type', () => {
      const engine = createEngine();
      engine.registry.register(Animal, { read: readTag('animal') });
      engine.registry.register(Dog, { read: readTag('dog') });

      expect(evaluate(new Puppy('p'), 'x', { engine })).toBe('dog:x');
      expect(evaluate(new Cat('c'), 'x', { engine })).toBe('animal:x');
    });

    it('places a registered ancestor above existing descendants', () => {
      const registry = new TypeRegistry({ registerDefaultTypes: false });
      registry.register(Dog);
      registry.register(Cat);
      registry.register(Animal);

      expect(registry.describeForest()).toEqual([
        {
          name: 'Animal',
          children: [
            { name: 'Dog', children: [] },
            { name: 'Cat', children: [] },
          ],
        },
      ]);
    });

    it('prefers the later registration at equal depth', () => {
      const hasName = structuralType(
        'HasName',
        () => false,
        (value) => typeof value === 'object' && value !== null && 'name' in value
      );
      const hasId = structuralType(
        'HasId',
        () => false,
        (value) => typeof value === 'object' && value !== null && 'id' in value
      );
      class Named {
        name = 'n';
      }
      class Badge {
        name = 'n';
        id = 1;
      }
      const engine = createEngine();
      engine.registry.register(hasName, { read: readTag('name') });
      engine.registry.register(hasId, { read: readTag('id') });

      expect(evaluate(new Badge(), 'k', { engine })).toBe('id:k');
      expect(evaluate(new Named(), 'k', { engine })).toBe('name:k');
    });

    it('matches exact registrations only for the exact type', () => {
      const engine = createEngine();
      engine.registry.register(Animal, { read: readTag('animal'), exact: true });

      expect(evaluate(new Animal('a'), 'name', { engine })).toBe('animal:name');
      expect(evaluate(new Dog('d'), 'name', { engine })).toBe('d');
    });
  });

  describe('register', () => {
    it('omits disabled operations', () => {
      const registry = new TypeRegistry();
      registry.register(Animal, { read: false });
      expect(registry.types('read')).toEqual(['Object', 'Map', 'Array']);
    });

    it('detects iteration from the prototype', () => {
      const registry = new TypeRegistry();
      registry.register(Bag);
      registry.register(Animal);
      expect(registry.types('iterate')).toContain('Bag');
      expect(registry.types('iterate')).not.toContain('Animal');
    });

    it('detects set() writers on map-like classes', () => {
      class Store {
        last: unknown[] = [];
        get(): undefined {
          return undefined;
        }
        set(key: unknown, value: unknown): void {
          this.last = [key, value];
        }
      }
      const registry = new TypeRegistry();
      registry.register(Store);
      const store = new Store();
      registry.resolve(store).write?.(store, 'a', 1);
      expect(store.last).toEqual(['a', 1]);
    });

    it('gives primitive wrappers no writer', () => {
      const registry = new TypeRegistry();
      registry.register(String);
      expect(registry.types('write')).not.toContain('String');
    });

    it('keeps the forest when a type is registered again', () => {
      const engine = createEngine();
      engine.registry.register(Animal, { read: readTag('first') });
      engine.registry.register(Animal, { read: readTag('second') });

      expect(engine.registry.size).toBe(5);
      expect(evaluate(new Dog('d'), 'k', { engine })).toBe('second:k');
    });

    it('rejects values that are not types', () => {
      const registry = new TypeRegistry();
      expect(() => registry.register(JSON.parse('42'))).toThrow(RegistrationError);
      expect(() => registry.register(JSON.parse('42'))).toThrow(
        'register expected a class or structural type, not: 42'
      );
    });

    it('rejects inheritance cycles and leaves the registry unchanged', () => {
      const registry = new TypeRegistry();
      const anything = structuralType(
        'Anything',
        () => true,
        () => true
      );
      expect(() => registry.register(anything)).toThrow(
        'cannot register Anything: it is both an ancestor and a descendant of registered type Object'
      );
      expect(registry.size).toBe(4);
      expect(registry.types()).not.toContain('Anything');
    });
  });
});
