/**
 * One named database: series, access keys, continuous queries and write
 * listeners.
 *
 * Writes are synchronous. Each write:
 *  1. assigns sequence numbers and inserts points
 *  2. runs continuous queries (unless the write came from one)
 *  3. notifies listeners (streamed selects)
 */

import { randomBytes } from 'node:crypto';
import type { Statement, SelectQuery, TimeRange } from '../types/query.ts';
import type { NamePattern } from '../types/matcher.ts';
import type { AccessKey, Permission, SeriesResult, TimePrecision, WriteBatch } from '../types/series.ts';
import { Series } from '../storage/Series.ts';
import { matchSeriesNames } from '../transform/SeriesMatcher.ts';
import { parseSelect } from '../query/parseQuery.ts';
import { executeSelect, toSeriesResult, DEFAULT_LIMIT } from '../query/QueryExecutor.ts';
import { extractTimeBounds, DEFAULT_WINDOW_MS } from '../query/timeRange.ts';
import type { DatabaseSnapshot } from '../codec/snapshotCodec.ts';
import type { Logger } from '../util/logger.ts';
import { BadRequestError, ConflictError, ForbiddenError, NotFoundError, UnauthorizedError } from './errors.ts';
import { ContinuousQuery, targetName, toWriteBatch } from './ContinuousQuery.ts';
import type { QueryTarget } from './ContinuousQuery.ts';
import { IncrementalQuery } from './IncrementalQuery.ts';
import type { WriteEvent } from './IncrementalQuery.ts';

export const DATABASE_NAME = /^[A-Za-z0-9_.-]+$/;
export const LIST_SERIES_RESULT = 'list_series_result';

export type WriteListener = (event: WriteEvent) => void;

export interface DatabaseOptions {
  logger: Logger;
  clock: () => number;
}

export interface Subscription {
  initial: SeriesResult[];
  close(): void;
}

/** Permission a statement needs: anything that writes needs a write key. */
export function requiredPermission(stmt: Statement): Permission {
  if (stmt.type === 'delete') return 'write';
  if (stmt.type === 'select' && stmt.into !== undefined) return 'write';
  return 'read';
}

export class Database implements QueryTarget {
  private readonly series = new Map<string, Series>();
  private readonly derived = new Set<string>();
  private readonly keys = new Map<string, Permission>();
  private readonly continuous = new Map<number, ContinuousQuery>();
  private readonly listeners = new Set<WriteListener>();
  private readonly logger: Logger;
  private readonly clock: () => number;
  private sequence = 0;
  private nextQueryId = 1;

  /** Changed since the last snapshot. */
  dirty = false;

  constructor(readonly name: string, options: DatabaseOptions) {
    this.logger = options.logger.child(name);
    this.clock = options.clock;
  }

  // ─── Series ─────────────────────────────────────────────────────────────────

  seriesNames(): Iterable<string> {
    return this.series.keys();
  }

  getSeries(name: string): Series | undefined {
    return this.series.get(name);
  }

  get derivedSeries(): ReadonlySet<string> {
    return this.derived;
  }

  write(batches: WriteBatch[], options: { derived: boolean } = { derived: false }): WriteEvent {
    const event: WriteEvent = { afterSequence: this.sequence, touched: new Map(), derived: options.derived };
    for (const batch of batches) {
      if (batch.points.length === 0) continue;
      let series = this.series.get(batch.series);
      if (!series) {
        series = new Series(batch.series);
        this.series.set(batch.series, series);
      }
      if (options.derived) this.derived.add(batch.series);

      const times = event.touched.get(batch.series) ?? [];
      for (const p of batch.points) {
        series.insert(p.time, ++this.sequence, p.values);
        times.push(p.time);
      }
      event.touched.set(batch.series, times);
    }
    if (event.touched.size === 0) return event;
    this.dirty = true;

    if (!options.derived) {
      const now = this.clock();
      for (const cq of this.continuous.values()) {
        try {
          cq.handleWrite(event, now);
        } catch (err) {
          this.logger.error('Continuous query failed', { id: cq.id, error: String(err) });
        }
      }
    }
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error('Write listener failed, closing subscription', { error: String(err) });
        this.listeners.delete(listener);
      }
    }
    return event;
  }

  deleteRange(name: string, range: TimeRange): number {
    const series = this.series.get(name);
    if (!series) return 0;
    const removed = series.deleteRange(range.start, range.end);
    if (series.size === 0) {
      this.series.delete(name);
      this.derived.delete(name);
    }
    if (removed > 0) this.dirty = true;
    return removed;
  }

  /** Delete points in range from every matching series. */
  deleteSeries(pattern: NamePattern, range: TimeRange): number {
    let removed = 0;
    for (const name of matchSeriesNames(this.series.keys(), pattern)) removed += this.deleteRange(name, range);
    if (removed > 0) this.logger.debug('Deleted points', { removed });
    return removed;
  }

  // ─── Statements ─────────────────────────────────────────────────────────────

  execute(stmt: Statement, precision: TimePrecision = 's'): SeriesResult[] {
    const now = this.clock();
    switch (stmt.type) {
      case 'list': {
        const names = stmt.pattern ? matchSeriesNames(this.series.keys(), stmt.pattern) : [...this.series.keys()].sort();
        if (names.length === 0) return [];
        return [{ series: LIST_SERIES_RESULT, columns: ['time', 'name'], datapoints: names.map((n) => [0, n]) }];
      }
      case 'delete': {
        const bounds = extractTimeBounds(stmt.where, now, precision);
        if (bounds.residual) throw new BadRequestError('delete only accepts time conditions');
        this.deleteSeries(stmt.pattern, { start: bounds.start ?? -Infinity, end: bounds.end ?? Infinity });
        return [];
      }
      case 'select':
        return this.select(stmt, now, precision);
    }
  }

  private select(query: SelectQuery, now: number, precision: TimePrecision): SeriesResult[] {
    if (query.into === undefined) {
      return executeSelect(this, query, { now, precision }).map((r) => toSeriesResult(r, precision));
    }

    const { forever } = extractTimeBounds(query.where, now, precision);
    if (forever) {
      this.registerContinuous(query, { backfill: true, precision });
      return [];
    }

    const into = query.into;
    const results = executeSelect(this, query, { now, precision, limit: query.limit ?? Infinity });
    this.write(results.map((r) => toWriteBatch(r, targetName(into, r.series))));
    return [];
  }

  // ─── Continuous queries ─────────────────────────────────────────────────────

  registerContinuous(
    query: SelectQuery,
    options: { backfill: boolean; id?: number; precision?: TimePrecision }
  ): ContinuousQuery {
    const id = options.id ?? this.nextQueryId;
    if (this.continuous.has(id)) throw new ConflictError(`Continuous query ${id} already exists`);
    const cq = new ContinuousQuery(id, query, this, options.precision);
    this.nextQueryId = Math.max(this.nextQueryId, id + 1);
    this.continuous.set(id, cq);
    this.dirty = true;
    if (options.backfill) cq.backfill(this.clock());
    this.logger.info('Registered continuous query', { id, query: query.text });
    return cq;
  }

  listContinuous(): Array<{ id: number; query: string }> {
    return [...this.continuous.values()].map((cq) => ({ id: cq.id, query: cq.text }));
  }

  dropContinuous(id: number): void {
    if (!this.continuous.delete(id)) throw new NotFoundError(`Continuous query ${id} not found`);
    this.dirty = true;
    this.logger.info('Dropped continuous query', { id });
  }

  // ─── Streaming ──────────────────────────────────────────────────────────────

  /**
   * Evaluate a select now and call `onResults` with the rows each later
   * write adds. The scan floor is fixed at subscription time.
   */
  subscribe(
    query: SelectQuery,
    precision: TimePrecision,
    onResults: (results: SeriesResult[]) => void
  ): Subscription {
    const now = this.clock();
    const incremental = new IncrementalQuery(query, this, { precision, floor: now - DEFAULT_WINDOW_MS });
    const initial = incremental
      .initial(now, query.limit ?? DEFAULT_LIMIT)
      .map((r) => toSeriesResult(r, precision));

    const listener: WriteListener = (event) => {
      const { results } = incremental.update(event, this.clock());
      if (results.length > 0) onResults(results.map((r) => toSeriesResult(r, precision)));
    };
    this.listeners.add(listener);
    return { initial, close: () => this.listeners.delete(listener) };
  }

  // ─── Access keys ────────────────────────────────────────────────────────────

  addKey(permission: Permission, key: string = randomBytes(16).toString('hex')): AccessKey {
    if (this.keys.has(key)) throw new ConflictError('Api key already exists');
    this.keys.set(key, permission);
    this.dirty = true;
    return { key, permission };
  }

  listKeys(): AccessKey[] {
    return [...this.keys].map(([key, permission]) => ({ key, permission }));
  }

  removeKey(key: string): void {
    if (!this.keys.delete(key)) throw new NotFoundError('Api key not found');
    this.dirty = true;
  }

  /** A database without keys is open; otherwise write keys also grant read. */
  authorize(key: string | undefined, needed: Permission): void {
    if (this.keys.size === 0) return;
    if (key === undefined || key === '') throw new UnauthorizedError();
    const granted = this.keys.get(key);
    if (granted === undefined) throw new ForbiddenError();
    if (needed === 'write' && granted !== 'write') throw new ForbiddenError('Api key is read-only');
  }

  // ─── Snapshots ──────────────────────────────────────────────────────────────

  toSnapshot(): DatabaseSnapshot {
    return {
      sequence: this.sequence,
      keys: this.listKeys(),
      continuousQueries: [...this.continuous.values()].map((cq) => ({
        id: cq.id,
        query: cq.text,
        precision: cq.precision,
      })),
      series: [...this.series.values()].map((s) => ({
        name: s.name,
        derived: this.derived.has(s.name),
        columns: [...s.columns],
        points: [...s.all()],
      })),
    };
  }

  static fromSnapshot(name: string, snap: DatabaseSnapshot, options: DatabaseOptions): Database {
    const db = new Database(name, options);
    db.sequence = snap.sequence;
    for (const { key, permission } of snap.keys) db.keys.set(key, permission);
    for (const s of snap.series) {
      const series = new Series(s.name, s.columns);
      series.restore(s.points);
      db.series.set(s.name, series);
      if (s.derived) db.derived.add(s.name);
    }
    for (const { id, query, precision } of snap.continuousQueries) {
      try {
        db.registerContinuous(parseSelect(query), { backfill: false, id, precision });
      } catch (err) {
        db.logger.warn('Skipping continuous query from snapshot', { id, query, error: String(err) });
      }
    }
    db.dirty = false;
    return db;
  }
}
