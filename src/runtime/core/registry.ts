/**
 * Type Registry
 *
 * Maps runtime types to read/iterate/write handlers and resolves values
 * of unregistered subtypes to their most specific registered ancestor.
 *
 * Registered types form a specificity forest: every non-exact type sits
 * below the registered types it descends from. Resolution first tries the
 * value's exact type, then walks the forest per operation, preferring the
 * deepest match and, at equal depth, the most recent registration.
 */

import { RegistrationError } from '../../error-classes.js';
import {
  exactTypeOf,
  formatValue,
  isIterable,
  isPlainObject,
  typeName,
} from './values.js';

// ============================================================
// TYPE KEYS
// ============================================================

/** Any class, including built-ins such as Object, Map and Array */
export type Constructor = abstract new (...args: never[]) => unknown;

/**
 * A virtual type matched by shape instead of by prototype.
 * It is an ancestor of every class it accepts; Object is an ancestor of it.
 */
export interface StructuralType {
  readonly name: string;
  /** Whether instances of the class belong to this type */
  acceptsType(type: Constructor): boolean;
  /** Whether the value belongs to this type */
  matches(value: unknown): boolean;
}

export type TypeKey = Constructor | StructuralType;

export function structuralType(
  name: string,
  acceptsType: (type: Constructor) => boolean,
  matches: (value: unknown) => boolean
): StructuralType {
  return Object.freeze({ name, acceptsType, matches });
}

export function isConstructor(value: unknown): value is Constructor {
  return (
    typeof value === 'function' &&
    typeof Reflect.get(value, 'prototype') === 'object'
  );
}

function isStructuralType(value: unknown): value is StructuralType {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'acceptsType') === 'function' &&
    typeof Reflect.get(value, 'matches') === 'function'
  );
}

export function typeKeyName(type: TypeKey): string {
  const name: unknown = Reflect.get(type, 'name');
  return typeof name === 'string' && name !== '' ? name : '<anonymous>';
}

function prototypeOf(type: Constructor): object | undefined {
  const proto: unknown = Reflect.get(type, 'prototype');
  return typeof proto === 'object' && proto !== null ? proto : undefined;
}

function hasIterablePrototype(type: Constructor): boolean {
  const proto = prototypeOf(type);
  return (
    proto !== undefined &&
    type !== String &&
    typeof Reflect.get(proto, Symbol.iterator) === 'function'
  );
}

/** Whether `a` is `b` or descends from it */
function isSubtype(a: TypeKey, b: TypeKey): boolean {
  if (a === b || b === Object) return true;
  if (!isConstructor(b)) {
    return isConstructor(a) ? b.acceptsType(a) : false;
  }
  if (!isConstructor(a)) return false;
  const ancestor = prototypeOf(b);
  const descendant = prototypeOf(a);
  return (
    ancestor !== undefined &&
    descendant !== undefined &&
    Object.prototype.isPrototypeOf.call(ancestor, descendant)
  );
}

/** Whether the value is an instance of the type; everything is an Object */
function matchesType(value: unknown, type: TypeKey): boolean {
  if (type === Object) return true;
  if (!isConstructor(type)) return type.matches(value);
  if (value === null || value === undefined) return false;
  const proto = prototypeOf(type);
  return (
    proto !== undefined && Object.prototype.isPrototypeOf.call(proto, Object(value))
  );
}

// ============================================================
// HANDLERS
// ============================================================

export type ReadHandler = (target: unknown, key: unknown) => unknown;
export type IterateHandler = (target: unknown) => Iterable<unknown>;
export type WriteHandler = (target: unknown, key: unknown, value: unknown) => void;

export type RegistryOperation = 'read' | 'iterate' | 'write';

/** Capability handlers resolved for a value */
export interface TargetHandler {
  readonly read: ReadHandler | undefined;
  readonly iterate: IterateHandler | undefined;
  readonly write: WriteHandler | undefined;
}

/** Sentinel returned by resolve() when no registered type matches */
export const UNREGISTERED: TargetHandler = Object.freeze({
  read: undefined,
  iterate: undefined,
  write: undefined,
});

export interface RegisterOptions {
  /** Field reader; defaults to property access, false disables */
  readonly read?: ReadHandler | false | undefined;
  /** Element iterator; auto-detected when omitted, false disables */
  readonly iterate?: IterateHandler | false | undefined;
  /** Field writer; auto-detected when omitted, false disables */
  readonly write?: WriteHandler | false | undefined;
  /** Only match values of exactly this type (no subtype resolution) */
  readonly exact?: boolean | undefined;
}

/** A key missing from a record or mapping */
export class KeyNotFoundError extends Error {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`key not found: ${formatValue(key)}`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

function toPropertyKey(key: unknown): string | symbol {
  if (typeof key === 'string' || typeof key === 'symbol') return key;
  return String(key);
}

function toObject(value: unknown): object {
  return Object(value);
}

/**
 * Read a property. Plain objects expose own keys only; other values
 * expose inherited members too (getters, methods).
 */
export function readProperty(target: unknown, key: unknown): unknown {
  if (target === null || target === undefined) {
    throw new TypeError(
      `cannot read property ${formatValue(key)} of ${String(target)}`
    );
  }
  const name = toPropertyKey(key);
  const found = isPlainObject(target)
    ? Object.prototype.hasOwnProperty.call(target, name)
    : name in toObject(target);
  if (!found) throw new KeyNotFoundError(key);
  return Reflect.get(toObject(target), name);
}

export function writeProperty(target: unknown, key: unknown, value: unknown): void {
  if (typeof target !== 'object' || target === null) {
    throw new TypeError(
      `cannot set property ${formatValue(key)} on ${typeName(target)}`
    );
  }
  if (!Reflect.set(target, toPropertyKey(key), value)) {
    throw new TypeError(
      `property ${formatValue(key)} of ${typeName(target)} is read-only`
    );
  }
}

/** Integer keys, including canonical integer strings such as "-1" */
function toIndex(key: unknown): number | undefined {
  if (typeof key === 'number') return Number.isInteger(key) ? key : undefined;
  if (typeof key === 'string' && /^-?\d+$/.test(key)) return Number(key);
  return undefined;
}

function resolveIndex(target: readonly unknown[], index: number): number {
  const position = index < 0 ? target.length + index : index;
  if (position < 0 || position >= target.length) {
    throw new RangeError(
      `index ${index} out of range for array of length ${target.length}`
    );
  }
  return position;
}

function readArrayItem(target: unknown, key: unknown): unknown {
  const index = toIndex(key);
  if (!Array.isArray(target) || index === undefined) {
    return readProperty(target, key);
  }
  return target[resolveIndex(target, index)];
}

function writeArrayItem(target: unknown, key: unknown, value: unknown): void {
  const index = toIndex(key);
  if (!Array.isArray(target) || index === undefined) {
    writeProperty(target, key, value);
    return;
  }
  target[resolveIndex(target, index)] = value;
}

function readMapEntry(target: unknown, key: unknown): unknown {
  if (target instanceof Map && target.has(key)) return target.get(key);
  return readProperty(target, key);
}

function writeMapEntry(target: unknown, key: unknown, value: unknown): void {
  const set: unknown =
    typeof target === 'object' && target !== null
      ? Reflect.get(target, 'set')
      : undefined;
  if (typeof set !== 'function') {
    throw new TypeError(`${typeName(target)} has no set() method`);
  }
  Reflect.apply(set, target, [key, value]);
}

function iterateValue(target: unknown): Iterable<unknown> {
  if (!isIterable(target)) {
    throw new TypeError(`${typeName(target)} is not iterable`);
  }
  return target;
}

function iterateMapEntries(target: unknown): Iterable<unknown> {
  if (target instanceof Map) return target.entries();
  return iterateValue(target);
}

const PRIMITIVE_WRAPPERS: readonly unknown[] = [
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
];

function detectWrite(type: TypeKey): WriteHandler | undefined {
  if (!isConstructor(type) || PRIMITIVE_WRAPPERS.includes(type)) return undefined;
  if (isSubtype(type, Array)) return writeArrayItem;
  const proto = prototypeOf(type);
  if (
    proto !== undefined &&
    typeof Reflect.get(proto, 'get') === 'function' &&
    typeof Reflect.get(proto, 'set') === 'function'
  ) {
    return writeMapEntry;
  }
  return writeProperty;
}

function detectIterate(type: TypeKey): IterateHandler | undefined {
  if (!isConstructor(type) || !hasIterablePrototype(type)) return undefined;
  return iterateValue;
}

/** Every non-string iterable; iteration only */
export const ITERABLE: StructuralType = structuralType(
  'Iterable',
  hasIterablePrototype,
  (value) => isIterable(value)
);

// ============================================================
// REGISTRY
// ============================================================

interface RegistryEntry {
  readonly type: TypeKey;
  readonly handler: TargetHandler;
  readonly exact: boolean;
}

interface ForestNode {
  readonly type: TypeKey;
  children: ForestNode[];
}

export interface ForestDescription {
  readonly name: string;
  readonly children: readonly ForestDescription[];
}

export interface TypeRegistryOptions {
  /** Seed Object, Map, Array and Iterable handlers (default: true) */
  readonly registerDefaultTypes?: boolean | undefined;
}

export class TypeRegistry {
  private readonly entries = new Map<unknown, RegistryEntry>();
  private roots: ForestNode[] = [];

  constructor(options: TypeRegistryOptions = {}) {
    if (options.registerDefaultTypes ?? true) {
      this.registerDefaultTypes();
    }
  }

  /** Number of registered types */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Install handlers for a type.
   * Throws RegistrationError for non-types and inheritance cycles.
   */
  register(type: TypeKey, options: RegisterOptions = {}): void {
    if (!isConstructor(type) && !isStructuralType(type)) {
      throw new RegistrationError('RS-C002', { value: formatValue(type) });
    }

    for (const other of this.entries.keys()) {
      if (
        other !== type &&
        (isConstructor(other) || isStructuralType(other)) &&
        isSubtype(type, other) &&
        isSubtype(other, type)
      ) {
        throw new RegistrationError('RS-C001', {
          type: typeKeyName(type),
          other: typeKeyName(other),
        });
      }
    }

    const handler: TargetHandler = {
      read: options.read === false ? undefined : (options.read ?? readProperty),
      iterate:
        options.iterate === false
          ? undefined
          : (options.iterate ?? detectIterate(type)),
      write:
        options.write === false ? undefined : (options.write ?? detectWrite(type)),
    };

    const existing = this.entries.get(type);
    const exact = existing?.exact ?? options.exact ?? false;
    this.entries.set(type, { type, handler, exact });

    if (!existing && !exact) {
      this.roots = insertNode(this.roots, { type, children: [] });
    }
  }

  /** Combined handler for a value; UNREGISTERED when nothing matches */
  resolve(value: unknown): TargetHandler {
    const read = this.resolveOperation(value, 'read');
    const iterate = this.resolveOperation(value, 'iterate');
    const write = this.resolveOperation(value, 'write');
    if (!read && !iterate && !write) return UNREGISTERED;
    return {
      read: read?.read,
      iterate: iterate?.iterate,
      write: write?.write,
    };
  }

  /** Handler of the most specific registered type supporting `op` */
  resolveOperation(
    value: unknown,
    op: RegistryOperation
  ): TargetHandler | undefined {
    const exactType = exactTypeOf(value);
    const exact = this.entries.get(exactType === undefined ? Object : exactType);
    if (exact && exact.handler[op]) return exact.handler;

    const found = this.search(this.roots, value, op, 0);
    return found?.handler;
  }

  /** Names of registered types, optionally only those supporting `op` */
  types(op?: RegistryOperation): string[] {
    const names: string[] = [];
    for (const entry of this.entries.values()) {
      if (op === undefined || entry.handler[op]) {
        names.push(typeKeyName(entry.type));
      }
    }
    return names;
  }

  /** Nested view of the specificity forest */
  describeForest(): ForestDescription[] {
    return this.roots.map(describeNode);
  }

  private search(
    nodes: readonly ForestNode[],
    value: unknown,
    op: RegistryOperation,
    depth: number
  ): { handler: TargetHandler; depth: number } | undefined {
    let best: { handler: TargetHandler; depth: number } | undefined;
    for (const node of nodes) {
      if (!matchesType(value, node.type)) continue;
      const entry = this.entries.get(node.type);
      let candidate =
        entry && entry.handler[op] ? { handler: entry.handler, depth } : undefined;
      const deeper = this.search(node.children, value, op, depth + 1);
      if (deeper) candidate = deeper;
      // Later siblings were registered later and win ties
      if (candidate && (!best || candidate.depth >= best.depth)) {
        best = candidate;
      }
    }
    return best;
  }

  private registerDefaultTypes(): void {
    this.register(Object, {
      read: readProperty,
      write: writeProperty,
    });
    this.register(Map, {
      read: readMapEntry,
      iterate: iterateMapEntries,
      write: writeMapEntry,
    });
    this.register(Array, {
      read: readArrayItem,
      iterate: iterateValue,
      write: writeArrayItem,
    });
    this.register(ITERABLE, {
      read: false,
      iterate: iterateValue,
      write: false,
    });
  }
}

/**
 * Insert a node below its most specific ancestor, adopting siblings
 * that descend from it. Returns the new sibling list.
 */
function insertNode(siblings: ForestNode[], node: ForestNode): ForestNode[] {
  for (const sibling of siblings) {
    if (isSubtype(node.type, sibling.type)) {
      sibling.children = insertNode(sibling.children, node);
      return siblings;
    }
  }

  const remaining: ForestNode[] = [];
  for (const sibling of siblings) {
    if (isSubtype(sibling.type, node.type)) {
      node.children.push(sibling);
    } else {
      remaining.push(sibling);
    }
  }
  remaining.push(node);
  return remaining;
}

function describeNode(node: ForestNode): ForestDescription {
  return {
    name: typeKeyName(node.type),
    children: node.children.map(describeNode),
  };
}
