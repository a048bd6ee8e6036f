/**
 * Aggregate functions. Each group gets fresh accumulators; values arrive in
 * ascending time order so `first` and `last` follow time, not insertion.
 */

import type { Expr } from '../types/query.ts';
import type { Value } from '../types/series.ts';
import { BadRequestError } from '../core/errors.ts';
import { compareValues } from './evaluate.ts';

const AGGREGATE_NAMES = [
  'count',
  'sum',
  'mean',
  'avg',
  'min',
  'max',
  'first',
  'last',
  'median',
  'percentile',
  'stddev',
  'mode',
  'spread',
  'distinct',
  'top',
  'bottom',
] as const;

export const AGGREGATE_FUNCTIONS = new Set<string>(AGGREGATE_NAMES);

export interface Accumulator {
  add(value: Value): void;
  result(): Value;
}

/** An aggregate call resolved to its input expression and accumulator factory. */
export interface AggregateSpec {
  name: string;
  /** undefined for count(*) */
  input: Expr | undefined;
  create(): Accumulator;
}

export function isAggregateCall(
  expr: Expr,
): expr is Extract<Expr, { kind: 'call' }> & { name: (typeof AGGREGATE_NAMES)[number] } {
  return expr.kind === 'call' && AGGREGATE_FUNCTIONS.has(expr.name);
}

/** True when any aggregate call appears in the expression. */
export function containsAggregate(expr: Expr): boolean {
  switch (expr.kind) {
    case 'call':
      return isAggregateCall(expr) || expr.args.some(containsAggregate);
    case 'binary':
      return containsAggregate(expr.left) || containsAggregate(expr.right);
    case 'negate':
      return containsAggregate(expr.operand);
    default:
      return false;
  }
}

export function compileAggregate(call: Extract<Expr, { kind: 'call' }>): AggregateSpec {
  const { name, args } = call;
  switch (name) {
    case 'count': {
      const [arg] = expectArgs(call, 1);
      if (arg.kind === 'wildcard') return { name, input: undefined, create: () => new CountAcc() };
      if (arg.kind === 'call' && arg.name === 'distinct') {
        const [inner] = expectArgs(arg, 1);
        return { name, input: inner, create: () => new CountDistinctAcc() };
      }
      return { name, input: arg, create: () => new CountAcc() };
    }
    case 'sum':
      return numeric(call, () => new SumAcc());
    case 'mean':
    case 'avg':
      return numeric(call, () => new MeanAcc());
    case 'min':
      return numeric(call, () => new ExtremeAcc(-1));
    case 'max':
      return numeric(call, () => new ExtremeAcc(1));
    case 'first':
      return { name, input: expectArgs(call, 1)[0], create: () => new FirstAcc() };
    case 'last':
      return { name, input: expectArgs(call, 1)[0], create: () => new LastAcc() };
    case 'median':
      return numeric(call, () => new PercentileAcc(50));
    case 'percentile': {
      const [p, input] = expectArgs(call, 2);
      if (p.kind !== 'number' || p.value < 0 || p.value > 100) {
        throw new BadRequestError('percentile() needs a percentage between 0 and 100');
      }
      const pct = p.value;
      return { name, input, create: () => new PercentileAcc(pct) };
    }
    case 'stddev':
      return numeric(call, () => new StddevAcc());
    case 'mode':
      return { name, input: expectArgs(call, 1)[0], create: () => new ModeAcc() };
    case 'spread':
      return numeric(call, () => new SpreadAcc());
    case 'distinct':
      return { name, input: expectArgs(call, 1)[0], create: () => new DistinctAcc() };
    default:
      throw new BadRequestError(`Unknown aggregate ${name}() with ${args.length} arguments`);
  }
}

function expectArgs(call: Extract<Expr, { kind: 'call' }>, n: 1): [Expr];
function expectArgs(call: Extract<Expr, { kind: 'call' }>, n: 2): [Expr, Expr];
function expectArgs(call: Extract<Expr, { kind: 'call' }>, n: number): Expr[] {
  if (call.args.length !== n) {
    throw new BadRequestError(`${call.name}() takes ${n} argument${n === 1 ? '' : 's'}`);
  }
  return call.args;
}

function numeric(call: Extract<Expr, { kind: 'call' }>, create: () => Accumulator): AggregateSpec {
  const [input] = expectArgs(call, 1);
  return { name: call.name, input, create };
}

// ─── Accumulators ───────────────────────────────────────────────────────────

class CountAcc implements Accumulator {
  private n = 0;
  add(value: Value): void {
    if (value !== null) this.n++;
  }
  result(): Value {
    return this.n;
  }
}

class CountDistinctAcc implements Accumulator {
  private readonly seen = new Set<string | number | boolean>();
  add(value: Value): void {
    if (value !== null) this.seen.add(value);
  }
  result(): Value {
    return this.seen.size;
  }
}

class SumAcc implements Accumulator {
  private sum = 0;
  private seen = false;
  add(value: Value): void {
    if (typeof value !== 'number') return;
    this.sum += value;
    this.seen = true;
  }
  result(): Value {
    return this.seen ? this.sum : null;
  }
}

class MeanAcc implements Accumulator {
  private sum = 0;
  private n = 0;
  add(value: Value): void {
    if (typeof value !== 'number') return;
    this.sum += value;
    this.n++;
  }
  result(): Value {
    return this.n === 0 ? null : this.sum / this.n;
  }
}

class ExtremeAcc implements Accumulator {
  private best: number | null = null;
  constructor(private readonly sign: 1 | -1) {}
  add(value: Value): void {
    if (typeof value !== 'number') return;
    if (this.best === null || (value - this.best) * this.sign > 0) this.best = value;
  }
  result(): Value {
    return this.best;
  }
}

class FirstAcc implements Accumulator {
  private value: Value = null;
  private seen = false;
  add(value: Value): void {
    if (this.seen || value === null) return;
    this.value = value;
    this.seen = true;
  }
  result(): Value {
    return this.value;
  }
}

class LastAcc implements Accumulator {
  private value: Value = null;
  add(value: Value): void {
    if (value !== null) this.value = value;
  }
  result(): Value {
    return this.value;
  }
}

class PercentileAcc implements Accumulator {
  private readonly values: number[] = [];
  constructor(private readonly pct: number) {}
  add(value: Value): void {
    if (typeof value === 'number') this.values.push(value);
  }
  result(): Value {
    return percentile(this.values, this.pct);
  }
}

class StddevAcc implements Accumulator {
  private readonly values: number[] = [];
  add(value: Value): void {
    if (typeof value === 'number') this.values.push(value);
  }
  result(): Value {
    const n = this.values.length;
    if (n === 0) return null;
    const mean = this.values.reduce((a, b) => a + b, 0) / n;
    const squareDiffs = this.values.reduce((acc, v) => acc + (v - mean) ** 2, 0);
    return Math.sqrt(squareDiffs / n);
  }
}

class ModeAcc implements Accumulator {
  private readonly counts = new Map<string | number | boolean, number>();
  add(value: Value): void {
    if (value !== null) this.counts.set(value, (this.counts.get(value) ?? 0) + 1);
  }
  result(): Value {
    let best: Value = null;
    let bestCount = 0;
    for (const [value, count] of this.counts) {
      // ties go to the smaller value
      if (count > bestCount || (count === bestCount && compareValues(value, best) < 0)) {
        best = value;
        bestCount = count;
      }
    }
    return best;
  }
}

class SpreadAcc implements Accumulator {
  private min = Infinity;
  private max = -Infinity;
  add(value: Value): void {
    if (typeof value !== 'number') return;
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
  }
  result(): Value {
    return this.min === Infinity ? null : this.max - this.min;
  }
}

/** Collects sorted distinct values; the executor expands them into rows. */
export class DistinctAcc implements Accumulator {
  private readonly seen = new Set<string | number | boolean>();
  add(value: Value): void {
    if (value !== null) this.seen.add(value);
  }
  values(): Value[] {
    return [...this.seen].sort(compareValues);
  }
  result(): Value {
    return this.seen.size;
  }
}

/** Linear interpolation between the closest ranks. */
export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lo = sorted[lower] ?? 0;
  const hi = sorted[upper] ?? lo;
  if (lower === upper) return lo;
  return lo + (hi - lo) * (index - lower);
}
