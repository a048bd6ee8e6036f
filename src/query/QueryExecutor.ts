/**
 * Select execution.
 *
 * compileSelect (once per query):
 *  - classify the query as raw or aggregate
 *  - resolve aggregate calls to accumulator factories
 *  - pick out top()/bottom() and distinct() fields
 *
 * runSelect (per execution):
 *  1. Resolve the source into streams of rows (one per series, or one for
 *     merge() / inner_join())
 *  2. Apply the time window, the residual where filter and afterSequence
 *  3. Raw: evaluate fields per row. Aggregate: bucket by time and group
 *     dimensions, feed accumulators, evaluate fields per group
 *  4. Order (newest first by default), apply the per-series limit
 */

import type { Condition, Expr, SelectField, SelectQuery, Source, TimeRange } from '../types/query.ts';
import type { Point, TimePrecision, Value, SeriesResult } from '../types/series.ts';
import type { Series } from '../storage/Series.ts';
import { BadRequestError } from '../core/errors.ts';
import { matchSeriesNames } from '../transform/SeriesMatcher.ts';
import { extractTimeBounds, resolveRange, PRECISION_MS } from './timeRange.ts';
import type { TimeBounds } from './timeRange.ts';
import { evalCondition, evalScalar, arithmetic, compareValues, referencedColumns } from './evaluate.ts';
import type { ColumnLookup } from './evaluate.ts';
import { compileAggregate, containsAggregate, isAggregateCall, DistinctAcc } from './aggregates.ts';
import type { Accumulator, AggregateSpec } from './aggregates.ts';

export const DEFAULT_LIMIT = 1000;

/** Read access the executor needs from a database. */
export interface SeriesSource {
  seriesNames(): Iterable<string>;
  getSeries(name: string): Series | undefined;
}

export interface ExecuteOptions {
  now: number;
  precision?: TimePrecision;
  /** Scan window, intersected with the where clause's own bounds. */
  range?: TimeRange;
  /** Lower bound when the where clause gives none (default now - 1h). */
  defaultStart?: number;
  /** Keep only rows written after this sequence number. */
  afterSequence?: number;
  /** Restrict pattern sources to these series. */
  onlySeries?: ReadonlySet<string>;
  /** Never read these series through a pattern source. */
  excludeSeries?: ReadonlySet<string>;
  /** Override the query's limit (Infinity for none). */
  limit?: number;
}

export interface ResultRow {
  time: number; // ms
  values: Value[];
  dims: Value[];
}

export interface QueryResult {
  series: string;
  columns: string[]; // field columns, then "time", then dimensions
  rows: ResultRow[];
}

type CallExpr = Extract<Expr, { kind: 'call' }>;

interface RankField {
  index: number;
  n: number;
  direction: 1 | -1; // 1 = top, -1 = bottom
}

export interface SelectPlan {
  query: SelectQuery;
  aggregate: boolean;
  /** Aggregate call nodes, matched by identity during evaluation. */
  aggregates: Array<{ node: CallExpr; spec: AggregateSpec }>;
  rank: RankField | undefined;
  distinct: { index: number; node: CallExpr } | undefined;
}

interface Row {
  time: number;
  sequence: number;
  get: ColumnLookup;
}

interface Stream {
  name: string;
  columns: string[];
  rows: Row[];
}

// ─── Compilation ────────────────────────────────────────────────────────────

export function compileSelect(query: SelectQuery): SelectPlan {
  for (const field of query.fields) checkFunctions(field.expr, true);
  if (query.where) checkConditionFunctions(query.where);

  const aggregate = query.fields.some((f) => containsAggregate(f.expr));
  const plan: SelectPlan = { query, aggregate, aggregates: [], rank: undefined, distinct: undefined };

  if (!aggregate) {
    if (query.groupBy.dimensions.length > 0) {
      throw new BadRequestError('group_by on columns needs an aggregate in the select');
    }
    if (query.groupBy.interval !== undefined && query.source.kind !== 'join') {
      throw new BadRequestError('group_by time() needs an aggregate in the select');
    }
    return plan;
  }

  const dims = new Set(query.groupBy.dimensions);
  query.fields.forEach((field, index) => {
    let expr = field.expr;
    if (expr.kind === 'call' && (expr.name === 'top' || expr.name === 'bottom')) {
      if (plan.rank) throw new BadRequestError('Only one top() or bottom() per query');
      const [n, inner] = expr.args;
      if (expr.args.length !== 2 || !n || !inner || n.kind !== 'number' || !Number.isInteger(n.value) || n.value < 1) {
        throw new BadRequestError(`${expr.name}() takes (n, aggregate)`);
      }
      plan.rank = { index, n: n.value, direction: expr.name === 'top' ? 1 : -1 };
      expr = inner;
    }
    if (expr.kind === 'call' && expr.name === 'distinct') {
      if (query.fields.length > 1) throw new BadRequestError('distinct() must be the only selected field');
      plan.distinct = { index, node: expr };
    }
    collectAggregates(expr, plan.aggregates);
    for (const column of columnsOutsideAggregates(expr)) {
      if (!dims.has(column)) {
        throw new BadRequestError(`Column '${column}' must be aggregated or listed in group_by`);
      }
    }
  });
  return plan;
}

/** Only diff() and aggregates are callable; aggregates never in where. */
function checkFunctions(expr: Expr, allowAggregates: boolean): void {
  switch (expr.kind) {
    case 'call':
      if (expr.name === 'diff') {
        if (expr.args.length !== 2) throw new BadRequestError('diff() takes 2 arguments');
      } else if (!isAggregateCall(expr)) {
        throw new BadRequestError(`Unknown function ${expr.name}()`);
      } else if (!allowAggregates) {
        throw new BadRequestError(`${expr.name}() is not allowed in where`);
      }
      for (const arg of expr.args) checkFunctions(arg, allowAggregates);
      break;
    case 'binary':
      checkFunctions(expr.left, allowAggregates);
      checkFunctions(expr.right, allowAggregates);
      break;
    case 'negate':
      checkFunctions(expr.operand, allowAggregates);
      break;
    default:
      break;
  }
}

function checkConditionFunctions(cond: Condition): void {
  if (cond.kind === 'compare') {
    checkFunctions(cond.left, false);
    checkFunctions(cond.right, false);
  } else {
    checkConditionFunctions(cond.left);
    checkConditionFunctions(cond.right);
  }
}

function collectAggregates(expr: Expr, out: SelectPlan['aggregates']): void {
  if (isAggregateCall(expr)) {
    if (expr.name === 'top' || expr.name === 'bottom') {
      throw new BadRequestError(`${expr.name}() must wrap a whole select field`);
    }
    out.push({ node: expr, spec: compileAggregate(expr) });
    return;
  }
  switch (expr.kind) {
    case 'call':
      for (const arg of expr.args) collectAggregates(arg, out);
      break;
    case 'binary':
      collectAggregates(expr.left, out);
      collectAggregates(expr.right, out);
      break;
    case 'negate':
      collectAggregates(expr.operand, out);
      break;
    default:
      break;
  }
}

function columnsOutsideAggregates(expr: Expr): string[] {
  if (isAggregateCall(expr)) return [];
  switch (expr.kind) {
    case 'column':
      return [expr.name];
    case 'call':
      return expr.args.flatMap(columnsOutsideAggregates);
    case 'binary':
      return [...columnsOutsideAggregates(expr.left), ...columnsOutsideAggregates(expr.right)];
    case 'negate':
      return columnsOutsideAggregates(expr.operand);
    default:
      return [];
  }
}

// ─── Execution ──────────────────────────────────────────────────────────────

export function runSelect(db: SeriesSource, plan: SelectPlan, options: ExecuteOptions): QueryResult[] {
  const { query } = plan;
  const bounds = extractTimeBounds(query.where, options.now, options.precision);
  const range = scanRange(bounds, options);
  const limit = options.limit ?? query.limit ?? DEFAULT_LIMIT;

  const results: QueryResult[] = [];
  for (const stream of resolveSource(db, query, range, options)) {
    const rows = stream.rows.filter(
      (row) =>
        (options.afterSequence === undefined || row.sequence > options.afterSequence) &&
        (bounds.residual === undefined || evalCondition(bounds.residual, row.get))
    );
    if (rows.length === 0) continue;

    const result = plan.aggregate
      ? aggregateStream(plan, stream, rows)
      : rawStream(plan, stream, rows);
    if (limit !== Infinity && result.rows.length > limit) result.rows = result.rows.slice(0, limit);
    if (result.rows.length > 0) results.push(result);
  }
  return results.sort((a, b) => (a.series < b.series ? -1 : a.series > b.series ? 1 : 0));
}

/** Compile and run in one step. */
export function executeSelect(db: SeriesSource, query: SelectQuery, options: ExecuteOptions): QueryResult[] {
  return runSelect(db, compileSelect(query), options);
}

function scanRange(bounds: TimeBounds, options: ExecuteOptions): TimeRange {
  if (options.range) {
    return {
      start: Math.max(options.range.start, bounds.start ?? -Infinity),
      end: Math.min(options.range.end, bounds.end ?? Infinity),
    };
  }
  return resolveRange(bounds, options.now, options.defaultStart);
}

// ─── Sources ────────────────────────────────────────────────────────────────

function pointRow(series: Series, p: Point): Row {
  return { time: p.time, sequence: p.sequence, get: (column) => series.valueOf(p, column) };
}

function resolveSource(db: SeriesSource, query: SelectQuery, range: TimeRange, options: ExecuteOptions): Stream[] {
  const source: Source = query.source;
  switch (source.kind) {
    case 'series': {
      let names: string[];
      if (typeof source.pattern === 'string') {
        names = [source.pattern];
      } else {
        names = matchSeriesNames(db.seriesNames(), source.pattern)
          .filter((n) => !options.excludeSeries?.has(n));
      }
      const streams: Stream[] = [];
      for (const name of names) {
        if (options.onlySeries && !options.onlySeries.has(name)) continue;
        const series = db.getSeries(name);
        if (!series) continue;
        streams.push({
          name,
          columns: [...series.columns],
          rows: series.range(range.start, range.end).map((p) => pointRow(series, p)),
        });
      }
      return streams;
    }
    case 'merge': {
      if (options.onlySeries && !source.names.some((n) => options.onlySeries?.has(n))) return [];
      const columns: string[] = [];
      const rows: Row[] = [];
      for (const name of source.names) {
        const series = db.getSeries(name);
        if (!series) continue;
        for (const c of series.columns) if (!columns.includes(c)) columns.push(c);
        for (const p of series.range(range.start, range.end)) rows.push(pointRow(series, p));
      }
      rows.sort((a, b) => a.time - b.time || a.sequence - b.sequence);
      return [{ name: source.names.join('_merge_'), columns, rows }];
    }
    case 'join': {
      const { left, right } = source;
      if (options.onlySeries && !options.onlySeries.has(left.name) && !options.onlySeries.has(right.name)) return [];
      const ls = db.getSeries(left.name);
      const rs = db.getSeries(right.name);
      if (!ls || !rs) return [];
      const interval = query.groupBy.interval;
      const lp = newestByKey(ls.range(range.start, range.end), interval);
      const rp = newestByKey(rs.range(range.start, range.end), interval);

      const rows: Row[] = [];
      for (const [key, l] of lp) {
        const r = rp.get(key);
        if (!r) continue;
        rows.push({
          time: key,
          sequence: Math.max(l.sequence, r.sequence),
          get: (column) => joinLookup(column, left.alias, ls, l, right.alias, rs, r),
        });
      }
      rows.sort((a, b) => a.time - b.time);
      return [{
        name: `${left.name}_join_${right.name}`,
        columns: [
          ...ls.columns.map((c) => `${left.alias}.${c}`),
          ...rs.columns.map((c) => `${right.alias}.${c}`),
        ],
        rows,
      }];
    }
  }
}

/** Newest point per exact time, or per bucket start when an interval is given. */
function newestByKey(points: Point[], interval: number | undefined): Map<number, Point> {
  const out = new Map<number, Point>();
  for (const p of points) {
    // points arrive oldest first, so later entries win
    out.set(interval ? Math.floor(p.time / interval) * interval : p.time, p);
  }
  return out;
}

function joinLookup(
  column: string,
  leftAlias: string, ls: Series, lp: Point,
  rightAlias: string, rs: Series, rp: Point
): Value {
  if (column.startsWith(`${leftAlias}.`)) return ls.valueOf(lp, column.slice(leftAlias.length + 1));
  if (column.startsWith(`${rightAlias}.`)) return rs.valueOf(rp, column.slice(rightAlias.length + 1));
  return ls.columnIndexOf(column) !== undefined ? ls.valueOf(lp, column) : rs.valueOf(rp, column);
}

// ─── Raw selections ─────────────────────────────────────────────────────────

function expandFields(fields: SelectField[], columns: string[]): SelectField[] {
  return fields.flatMap((f) =>
    f.expr.kind === 'wildcard'
      ? columns.map((name): SelectField => ({ expr: { kind: 'column', name } }))
      : [f]
  );
}

function rawStream(plan: SelectPlan, stream: Stream, rows: Row[]): QueryResult {
  const fields = expandFields(plan.query.fields, stream.columns);
  const refs = fields.flatMap((f) => referencedColumns(f.expr));

  const out: Array<ResultRow & { sequence: number }> = [];
  for (const row of rows) {
    if (refs.length > 0 && refs.every((c) => row.get(c) === null)) continue;
    out.push({
      time: row.time,
      sequence: row.sequence,
      values: fields.map((f) => evalScalar(f.expr, row.get)),
      dims: [],
    });
  }

  const dir = plan.query.order === 'asc' ? 1 : -1;
  out.sort((a, b) => dir * (a.time - b.time) || dir * (a.sequence - b.sequence));
  return {
    series: stream.name,
    columns: [...fields.map(fieldName), 'time'],
    rows: out.map(({ time, values, dims }) => ({ time, values, dims })),
  };
}

// ─── Aggregation ────────────────────────────────────────────────────────────

interface Group {
  bucket: number;
  newest: number;
  dims: Value[];
  accs: Accumulator[];
}

function aggregateStream(plan: SelectPlan, stream: Stream, rows: Row[]): QueryResult {
  const { query } = plan;
  const { interval, dimensions } = query.groupBy;

  const groups = new Map<string, Group>();
  for (const row of rows) {
    const bucket = interval ? Math.floor(row.time / interval) * interval : 0;
    const dims = dimensions.map((d) => row.get(d));
    const key = JSON.stringify([bucket, ...dims]);
    let group = groups.get(key);
    if (!group) {
      group = { bucket, newest: row.time, dims, accs: plan.aggregates.map((a) => a.spec.create()) };
      groups.set(key, group);
    }
    if (row.time > group.newest) group.newest = row.time;
    for (let i = 0; i < plan.aggregates.length; i++) {
      const input = plan.aggregates[i]?.spec.input;
      // count(*) counts rows, so feed it a non-null marker
      group.accs[i]?.add(input ? evalScalar(input, row.get) : true);
    }
  }

  let out: ResultRow[] = [];
  for (const group of groups.values()) {
    const time = interval ? group.bucket : group.newest;
    if (plan.distinct) {
      const idx = plan.aggregates.findIndex((a) => a.node === plan.distinct?.node);
      const acc = group.accs[idx];
      if (acc instanceof DistinctAcc) {
        for (const value of acc.values()) out.push({ time, values: [value], dims: group.dims });
      }
      continue;
    }
    out.push({
      time,
      values: query.fields.map((f) => evalGroupExpr(plan, f.expr, group)),
      dims: group.dims,
    });
  }

  if (plan.rank) out = applyRank(out, plan.rank);

  const dir = query.order === 'asc' ? 1 : -1;
  out.sort((a, b) => dir * (a.time - b.time) || compareRows(a.dims, b.dims) || compareRows(a.values, b.values));

  return {
    series: stream.name,
    columns: [...query.fields.map(fieldName), 'time', ...dimensions],
    rows: out,
  };
}

function evalGroupExpr(plan: SelectPlan, expr: Expr, group: Group): Value {
  const idx = plan.aggregates.findIndex((a) => a.node === expr);
  if (idx >= 0) return group.accs[idx]?.result() ?? null;

  switch (expr.kind) {
    case 'column': {
      const d = plan.query.groupBy.dimensions.indexOf(expr.name);
      return d >= 0 ? group.dims[d] ?? null : null;
    }
    case 'binary':
      return arithmetic(expr.op, evalGroupExpr(plan, expr.left, group), evalGroupExpr(plan, expr.right, group));
    case 'negate': {
      const v = evalGroupExpr(plan, expr.operand, group);
      return typeof v === 'number' ? -v : null;
    }
    case 'call': {
      const [a, b] = expr.args;
      if ((expr.name === 'top' || expr.name === 'bottom') && b) return evalGroupExpr(plan, b, group);
      if (expr.name === 'diff' && a && b) {
        return arithmetic('-', evalGroupExpr(plan, a, group), evalGroupExpr(plan, b, group));
      }
      throw new BadRequestError(`${expr.name}() is not allowed here`);
    }
    default:
      return evalScalar(expr, () => null);
  }
}

/** Keep the n best-ranked rows within each time bucket. */
function applyRank(rows: ResultRow[], rank: RankField): ResultRow[] {
  const byTime = new Map<number, ResultRow[]>();
  for (const row of rows) {
    const list = byTime.get(row.time) ?? [];
    list.push(row);
    byTime.set(row.time, list);
  }
  const kept: ResultRow[] = [];
  for (const list of byTime.values()) {
    list.sort((a, b) => {
      const va = a.values[rank.index] ?? null;
      const vb = b.values[rank.index] ?? null;
      if (va === null || vb === null) return (va === null ? 1 : 0) - (vb === null ? 1 : 0);
      return rank.direction * compareValues(vb, va) || compareRows(a.dims, b.dims);
    });
    kept.push(...list.slice(0, rank.n));
  }
  return kept;
}

function compareRows(a: Value[], b: Value[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const c = compareValues(a[i] ?? null, b[i] ?? null);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

// ─── Output ─────────────────────────────────────────────────────────────────

export function fieldName(field: SelectField): string {
  if (field.alias) return field.alias;
  const { expr } = field;
  switch (expr.kind) {
    case 'column':
      return expr.name;
    case 'call':
      return expr.name;
    default:
      return 'expr';
  }
}

/** Render for the wire: `[...values, time, ...dims]` with time in the requested precision. */
export function toSeriesResult(result: QueryResult, precision: TimePrecision = 's'): SeriesResult {
  const unit = PRECISION_MS[precision];
  return {
    series: result.series,
    columns: result.columns,
    datapoints: result.rows.map((r) => [...r.values, Math.floor(r.time / unit), ...r.dims]),
  };
}
