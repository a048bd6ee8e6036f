/**
 * Splits a where clause into a time window and the remaining row filter.
 *
 * Time comparisons must sit in the top-level `and` chain; the rest of the
 * chain is reassembled into the residual condition evaluated per row.
 */

import type { CompareOp, Condition, Expr, TimeRange } from '../types/query.ts';
import type { TimePrecision } from '../types/series.ts';
import { BadRequestError } from '../core/errors.ts';

export const DEFAULT_WINDOW_MS = 3_600_000;

export const PRECISION_MS: Record<TimePrecision, number> = {
  s: 1_000,
  ms: 1,
  u: 0.001,
};

export interface TimeBounds {
  start: number | undefined;
  end: number | undefined;
  /** `time < forever` was given */
  forever: boolean;
  residual: Condition | undefined;
}

export function extractTimeBounds(
  where: Condition | undefined,
  now: number,
  precision: TimePrecision = 's'
): TimeBounds {
  const bounds: TimeBounds = { start: undefined, end: undefined, forever: false, residual: undefined };
  if (!where) return bounds;

  const rest: Condition[] = [];
  for (const c of conjuncts(where)) {
    const time = c.kind === 'compare' ? timeComparison(c.op, c.left, c.right) : undefined;
    if (!time) {
      if (mentionsTime(c)) throw new BadRequestError('Time conditions must be combined with "and"');
      rest.push(c);
      continue;
    }
    applyBound(bounds, time.op, time.other, now, precision);
  }

  bounds.residual = rest.reduce<Condition | undefined>(
    (acc, c) => (acc ? { kind: 'and', left: acc, right: c } : c),
    undefined
  );
  return bounds;
}

/** Resolve bounds with defaults: `[now - 1h, now]`. */
export function resolveRange(bounds: TimeBounds, now: number, defaultStart = now - DEFAULT_WINDOW_MS): TimeRange {
  return {
    start: bounds.start ?? defaultStart,
    end: bounds.end ?? now,
  };
}

/** Evaluate a time expression to milliseconds since epoch. */
export function evalTime(expr: Expr, now: number, precision: TimePrecision): number {
  switch (expr.kind) {
    case 'now':
      return now;
    case 'forever':
      return Infinity;
    case 'number':
      return expr.value * PRECISION_MS[precision];
    case 'duration':
      return expr.ms;
    case 'string': {
      const parsed = Date.parse(expr.value);
      if (Number.isNaN(parsed)) throw new BadRequestError(`Invalid date '${expr.value}'`);
      return parsed;
    }
    case 'negate':
      return -evalTime(expr.operand, now, precision);
    case 'binary': {
      const left = evalTime(expr.left, now, precision);
      const right = evalTime(expr.right, now, precision);
      if (expr.op === '+') return left + right;
      if (expr.op === '-') return left - right;
      break;
    }
    default:
      break;
  }
  throw new BadRequestError('Unsupported time expression');
}

// ─── Internals ──────────────────────────────────────────────────────────────

function conjuncts(c: Condition): Condition[] {
  return c.kind === 'and' ? [...conjuncts(c.left), ...conjuncts(c.right)] : [c];
}

function isTime(e: Expr): boolean {
  return e.kind === 'column' && e.name.toLowerCase() === 'time';
}

const FLIPPED: Partial<Record<CompareOp, CompareOp>> = { '<': '>', '<=': '>=', '>': '<', '>=': '<=', '=': '=' };

function timeComparison(op: CompareOp, left: Expr, right: Expr): { op: CompareOp; other: Expr } | undefined {
  if (isTime(left)) return { op, other: right };
  const flipped = FLIPPED[op];
  if (isTime(right) && flipped) return { op: flipped, other: left };
  return undefined;
}

function mentionsTime(c: Condition): boolean {
  if (c.kind === 'compare') return isTime(c.left) || isTime(c.right);
  return mentionsTime(c.left) || mentionsTime(c.right);
}

function applyBound(bounds: TimeBounds, op: CompareOp, other: Expr, now: number, precision: TimePrecision): void {
  const t = evalTime(other, now, precision);
  if (t === Infinity) {
    if (op !== '<' && op !== '<=') throw new BadRequestError('forever can only be an upper bound');
    bounds.forever = true;
    bounds.end = Infinity;
    return;
  }
  switch (op) {
    case '>':
      raiseStart(bounds, Math.floor(t) + 1);
      break;
    case '>=':
      raiseStart(bounds, Math.ceil(t));
      break;
    case '<':
      lowerEnd(bounds, Math.ceil(t) - 1);
      break;
    case '<=':
      lowerEnd(bounds, Math.floor(t));
      break;
    case '=':
      raiseStart(bounds, Math.ceil(t));
      lowerEnd(bounds, Math.floor(t));
      break;
    default:
      throw new BadRequestError(`Operator ${op} cannot compare time`);
  }
}

function raiseStart(bounds: TimeBounds, t: number): void {
  bounds.start = bounds.start === undefined ? t : Math.max(bounds.start, t);
}

function lowerEnd(bounds: TimeBounds, t: number): void {
  if (bounds.forever) return;
  bounds.end = bounds.end === undefined ? t : Math.min(bounds.end, t);
}
