/**
 * Scope Tracing
 *
 * Renders a captured frame chain (typically `error.scope`) as text.
 * The root frame created by evaluate() is not part of the trace.
 */

import { TExpr } from './deferred.js';
import type { Scope } from './scope.js';
import { Path } from './specs.js';
import { formatValue, typeName } from './values.js';

/** Frames from the first evaluation step down to `scope` */
function traceFrames(scope: Scope): Scope[] {
  return scope
    .chain()
    .reverse()
    .filter((frame) => frame.parent !== undefined);
}

function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  if (width < 3) return '.'.repeat(Math.max(0, width));
  return `${text.slice(0, Math.max(0, width - 3))}...`;
}

/**
 * One-line summary: `/`-separated frames showing the spec's type (or
 * the expression itself for T and Path specs), `!Type` when the target
 * changes, and `<a->b>` for path segments the frame adds.
 *
 * @example
 * // evaluate({ items: [{ a: 1 }, {}] }, pipe('items', ['a'])) fails with
 * lineStack(error.scope) // '/Pipeline!Object/Array!Array<items>/String!Object<1>'
 */
export function lineStack(scope: Scope): string {
  const segments: string[] = [];
  let first = true;
  let previous: unknown = undefined;

  for (const frame of traceFrames(scope)) {
    const spec = frame.spec;
    segments.push('/');
    segments.push(
      spec instanceof TExpr || spec instanceof Path ? String(spec) : typeName(spec)
    );
    if (first || frame.target !== previous) {
      segments.push('!', typeName(frame.target));
    }
    if (frame.segments.length > 0) {
      segments.push('<', frame.segments.map(String).join('->'), '>');
    }
    previous = frame.target;
    first = false;
  }
  return segments.join('');
}

function stackLines(scope: Scope, render: (value: unknown) => string): string {
  const lines: string[] = [];
  let first = true;
  let previous: unknown = undefined;

  for (const frame of traceFrames(scope)) {
    if (first || frame.target !== previous) {
      lines.push(`target: ${render(frame.target)}`);
    }
    lines.push(`spec:   ${render(frame.spec)}`);
    previous = frame.target;
    first = false;
  }
  return lines.join('\n');
}

/** A target/spec line pair per frame; values cut to `width` characters */
export function shortStack(scope: Scope, width = 60): string {
  return stackLines(scope, (value) => truncate(formatValue(value), width));
}

/** Like shortStack, with full representations */
export function tallStack(scope: Scope): string {
  return stackLines(scope, (value) => formatValue(value));
}
