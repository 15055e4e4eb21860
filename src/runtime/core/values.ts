/**
 * Value Utilities
 *
 * Formatting, type naming and equality helpers shared by the registry,
 * the evaluator, error messages and the tracer.
 */

/** A human-readable path segment: a key, an index, or a spec description */
export type PathSegment = string | number;

/** Check for a plain object: prototype is Object.prototype or null */
export function isPlainObject(
  value: unknown
): value is Record<string | symbol, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Check whether a value implements the iteration protocol (strings excluded) */
export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}

/** A function spec or callee; called with whatever arguments the spec supplies */
export type Callable = (...args: never[]) => unknown;

export function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

/** An empty Map of the same class as `map` (Map subclasses included) */
export function emptyMapLike(map: Map<unknown, unknown>): Map<unknown, unknown> {
  const created: unknown = Reflect.construct(map.constructor, []);
  return created instanceof Map ? created : new Map<unknown, unknown>();
}

/**
 * Exact runtime type of a value.
 * Primitives map to their wrapper constructor; null-prototype objects
 * count as Object; null and undefined have no type.
 */
export function exactTypeOf(value: unknown): unknown {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'string':
      return String;
    case 'number':
      return Number;
    case 'boolean':
      return Boolean;
    case 'bigint':
      return BigInt;
    case 'symbol':
      return Symbol;
    case 'function':
    case 'object': {
      if (value === null) return undefined;
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto === null) return Object;
      if (typeof proto !== 'object') return undefined;
      const ctor: unknown = Reflect.get(proto, 'constructor');
      return typeof ctor === 'function' ? ctor : undefined;
    }
  }
}

/** Name of a value's runtime type, for messages and traces */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  const type = exactTypeOf(value);
  if (typeof type === 'function' && type.name !== '') return type.name;
  return typeof value === 'undefined' ? 'undefined' : 'Object';
}

/** Name of a function-valued spec or the empty string */
function functionName(fn: { name: string }): string {
  return fn.name;
}

/**
 * Format a value for display.
 * Strings are quoted, containers are expanded, and objects that define
 * their own toString() (spec constructors, T expressions) use it.
 */
export function formatValue(value: unknown): string {
  return format(value, new Set<object>());
}

function format(value: unknown, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function': {
      const name = functionName(value);
      return name === '' ? '[Function]' : `[Function ${name}]`;
    }
  }

  if (value === null) return 'null';
  if (typeof value !== 'object') return String(value);
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return `[${value.map((item) => format(item, seen)).join(', ')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value.entries()].map(
        ([k, v]) => `${format(k, seen)} => ${format(v, seen)}`
      );
      return `Map {${entries.join(', ')}}`;
    }
    if (value instanceof Set) {
      const items = [...value].map((item) => format(item, seen));
      return `Set {${items.join(', ')}}`;
    }
    if (value instanceof Error) {
      return `${value.name}(${JSON.stringify(value.message)})`;
    }
    if (isPlainObject(value)) {
      return formatEntries(value, seen, '');
    }

    // Objects defining their own toString (e.g. spec constructors)
    const toString: unknown = Reflect.get(value, 'toString');
    if (typeof toString === 'function' && toString !== Object.prototype.toString) {
      return String(value);
    }
    return formatEntries(value, seen, `${typeName(value)} `);
  } finally {
    seen.delete(value);
  }
}

function formatEntries(value: object, seen: Set<object>, prefix: string): string {
  const entries = Object.entries(value).map(
    ([k, v]) => `${JSON.stringify(k)}: ${format(v, seen)}`
  );
  return `${prefix}{${entries.join(', ')}}`;
}

/**
 * Describe a spec as a single path segment.
 * Strings stay as-is, functions use their name, everything else is formatted.
 */
export function describeSpec(spec: unknown): PathSegment {
  if (typeof spec === 'string') return spec;
  if (typeof spec === 'function') {
    const name = functionName(spec);
    return name === '' ? '<function>' : name;
  }
  return formatValue(spec);
}

/** Render an " (at [...])" suffix for messages, empty for the root path */
export function formatAt(path: readonly PathSegment[]): string {
  return path.length > 0 ? ` (at ${formatValue(path)})` : '';
}

/**
 * Deep structural equality.
 * - Primitives: Object.is semantics except +0/-0 are equal
 * - Arrays: length + recursive element equality
 * - Maps: same keys (by identity) + recursive value equality
 * - Plain objects: same keys + recursive value equality (order-independent)
 * - Everything else: reference equality
 */
export function deepEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a === null || b === null) return false;

  const aIsArray = Array.isArray(a);
  const bIsArray = Array.isArray(b);
  if (aIsArray !== bIsArray) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, aVal] of a) {
      if (!b.has(key) || !deepEquals(aVal, b.get(key))) return false;
    }
    return true;
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;

  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!deepEquals(a[key], b[key])) return false;
  }
  return true;
}

/** Render a constructor-style repr such as Path("a", 0) */
export function formatCall(name: string, args: readonly unknown[]): string {
  return `${name}(${args.map((arg) => formatValue(arg)).join(', ')})`;
}
