/**
 * A `select ... where time < forever ... into <target>` kept up to date.
 *
 * Registration backfills over all existing data. Each later write to a
 * source series:
 *  - raw query: the new matching rows are appended to the target
 *  - aggregate: every bucket the write touched is deleted from the target
 *    and written again from a fresh evaluation
 *
 * Target writes are marked derived so they never trigger continuous queries.
 */

import type { SelectQuery, TimeRange } from '../types/query.ts';
import type { TimePrecision, Value, WriteBatch } from '../types/series.ts';
import type { QueryResult, SeriesSource } from '../query/QueryExecutor.ts';
import { BadRequestError } from './errors.ts';
import { IncrementalQuery } from './IncrementalQuery.ts';
import type { WriteEvent } from './IncrementalQuery.ts';

export const SERIES_NAME_PLACEHOLDER = ':series_name';

/** What a continuous query needs from its database. */
export interface QueryTarget extends SeriesSource {
  readonly derivedSeries: ReadonlySet<string>;
  write(batches: WriteBatch[], options: { derived: boolean }): WriteEvent;
  deleteRange(series: string, range: TimeRange): number;
}

export class ContinuousQuery {
  private readonly incremental: IncrementalQuery;
  /**
   * Pattern source with one literal target: a touched bucket is rebuilt from
   * every matching source, and each source writes its own row into it.
   */
  private readonly recomputeAll: boolean;

  constructor(
    readonly id: number,
    readonly query: SelectQuery,
    private readonly db: QueryTarget,
    readonly precision: TimePrecision = 's'
  ) {
    const { into, source } = query;
    if (into === undefined) throw new BadRequestError('A continuous query needs an into clause');
    this.incremental = new IncrementalQuery(query, db, {
      precision,
      floor: -Infinity,
      excludeSeries: db.derivedSeries,
    });
    if (this.incremental.plan.aggregate && query.groupBy.interval === undefined) {
      throw new BadRequestError('Continuous aggregate queries need group_by time(...)');
    }
    this.recomputeAll =
      !into.includes(SERIES_NAME_PLACEHOLDER) && source.kind === 'series' && typeof source.pattern !== 'string';
  }

  get text(): string {
    return this.query.text;
  }

  backfill(now: number): void {
    this.store(this.incremental.initial(now, Infinity), []);
  }

  handleWrite(event: WriteEvent, now: number): void {
    const { ranges, results } = this.incremental.update(event, now, this.recomputeAll);
    this.store(results, ranges);
  }

  private store(results: QueryResult[], ranges: TimeRange[]): void {
    const into = this.query.into ?? '';
    const batches = results.map((r) => toWriteBatch(r, targetName(into, r.series)));
    for (const target of new Set(batches.map((b) => b.series))) {
      for (const range of ranges) this.db.deleteRange(target, range);
    }
    if (batches.length > 0) this.db.write(batches, { derived: true });
  }
}

/** Resolve an into target for one result series. */
export function targetName(into: string, series: string): string {
  return into.split(SERIES_NAME_PLACEHOLDER).join(series);
}

/** Result rows → points: fields and group dimensions become columns. */
export function toWriteBatch(result: QueryResult, series: string): WriteBatch {
  const timeIndex = result.columns.indexOf('time');
  const fields = result.columns.slice(0, timeIndex);
  const dims = result.columns.slice(timeIndex + 1);
  return {
    series,
    points: result.rows.map((row) => {
      const values: Record<string, Value> = {};
      fields.forEach((c, i) => (values[c] = row.values[i] ?? null));
      dims.forEach((c, i) => (values[c] = row.dims[i] ?? null));
      return { time: row.time, values };
    }),
  };
}
