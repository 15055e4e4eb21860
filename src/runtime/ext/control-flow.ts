/**
 * Switch: first matching case wins
 */

import { RestructError, StructuralTypeError } from '../../error-classes.js';
import type { Scope } from '../core/scope.js';
import { Specifier } from '../core/specs.js';
import { formatAt, formatValue } from '../core/values.js';

/** A key spec and the value spec evaluated when it matches */
export type SwitchCase = readonly [key: unknown, value: unknown];

export type SwitchCases =
  | readonly SwitchCase[]
  | ReadonlyMap<unknown, unknown>
  | Readonly<Record<string, unknown>>;

export interface SwitchOptions {
  /** Returned when no case matches */
  readonly default?: unknown;
}

function isCaseList(cases: SwitchCases): cases is readonly SwitchCase[] {
  return Array.isArray(cases);
}

/**
 * Evaluate each key spec against the target in order. A key that raises
 * a RestructError does not match; the first key that succeeds has its
 * value spec evaluated, continuing from the key's frame.
 *
 * @example
 * evaluate({ a: 1 }, new Switch([['b', 'b'], ['a', T]])) // { a: 1 }
 */
export class Switch extends Specifier {
  readonly cases: readonly SwitchCase[];
  readonly hasDefault: boolean;
  readonly default: unknown;

  constructor(cases: SwitchCases, options: SwitchOptions = {}) {
    super();
    if (isCaseList(cases)) {
      for (const entry of cases) {
        if (!Array.isArray(entry) || entry.length !== 2) {
          throw new TypeError(
            `expected [key, value] case pairs, got ${formatValue(entry)}`
          );
        }
      }
      this.cases = [...cases];
    } else if (cases instanceof Map) {
      this.cases = [...cases.entries()];
    } else {
      this.cases = Object.entries(cases);
    }
    if (this.cases.length === 0) {
      throw new TypeError('expected at least one case');
    }
    this.hasDefault = 'default' in options;
    this.default = options.default;
  }

  apply(target: unknown, scope: Scope): unknown {
    for (const [key, value] of this.cases) {
      let frame: Scope;
      try {
        frame = scope.evaluateWithFrame(target, key).frame;
      } catch (error) {
        if (error instanceof RestructError) continue;
        throw error;
      }
      return frame.evaluate(target, value);
    }

    if (this.hasDefault) return this.default;
    throw new StructuralTypeError('RS-R008', {
      spec: String(this),
      at: formatAt(scope.path()),
    });
  }

  toString(): string {
    return `Switch(${formatValue(this.cases)})`;
  }
}
