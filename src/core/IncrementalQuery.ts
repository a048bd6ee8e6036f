/**
 * Re-evaluates a select after a write, touching only what the write could
 * have changed. Shared by continuous queries and streamed (SSE) selects.
 *
 *  - raw selects return the rows written after the event's sequence mark
 *  - aggregates grouped by time recompute every bucket a new point fell in
 *  - other aggregates recompute their whole window
 */

import type { SelectQuery, TimeRange } from '../types/query.ts';
import type { TimePrecision } from '../types/series.ts';
import { compileSelect, runSelect } from '../query/QueryExecutor.ts';
import type { ExecuteOptions, QueryResult, SelectPlan, SeriesSource } from '../query/QueryExecutor.ts';
import { compileMatcher, testMatcher } from '../transform/SeriesMatcher.ts';

/** What one write did to a database. */
export interface WriteEvent {
  /** Highest sequence number before this write. */
  afterSequence: number;
  /** Written series → times of the new points. */
  touched: Map<string, number[]>;
  /** Written by a continuous query. */
  derived: boolean;
}

export interface IncrementalOptions {
  precision?: TimePrecision;
  /** Lower bound of every scan. */
  floor: number;
  /** Series pattern sources never read. */
  excludeSeries?: ReadonlySet<string>;
}

export interface IncrementalUpdate {
  /** Windows that were recomputed from scratch. Empty for raw selects. */
  ranges: TimeRange[];
  results: QueryResult[];
}

export class IncrementalQuery {
  readonly plan: SelectPlan;

  constructor(
    readonly query: SelectQuery,
    private readonly db: SeriesSource,
    private readonly options: IncrementalOptions
  ) {
    this.plan = compileSelect(query);
  }

  /** Full evaluation from the floor. */
  initial(now: number, limit: number): QueryResult[] {
    return runSelect(this.db, this.plan, { ...this.base(now), defaultStart: this.options.floor, limit });
  }

  /**
   * Evaluate what changed with a write.
   * `allSeries` widens a pattern source back to every matching series.
   */
  update(event: WriteEvent, now: number, allSeries = false): IncrementalUpdate {
    const { names, times } = this.relevant(event);
    if (names.size === 0) return { ranges: [], results: [] };

    const options: ExecuteOptions = {
      ...this.base(now),
      limit: Infinity,
      onlySeries: allSeries ? undefined : names,
    };
    const everything: TimeRange = { start: this.options.floor, end: Infinity };

    if (!this.plan.aggregate) {
      return {
        ranges: [],
        results: runSelect(this.db, this.plan, { ...options, range: everything, afterSequence: event.afterSequence }),
      };
    }

    const interval = this.query.groupBy.interval;
    if (interval === undefined) {
      return { ranges: [everything], results: runSelect(this.db, this.plan, { ...options, range: everything }) };
    }

    const buckets = [...new Set(times.map((t) => Math.floor(t / interval) * interval))].sort((a, b) => a - b);
    const ranges = buckets.map((start): TimeRange => ({ start, end: start + interval - 1 }));
    const merged = new Map<string, QueryResult>();
    for (const range of ranges) {
      for (const result of runSelect(this.db, this.plan, { ...options, range })) {
        const existing = merged.get(result.series);
        if (existing) existing.rows.push(...result.rows);
        else merged.set(result.series, result);
      }
    }
    const dir = this.query.order === 'asc' ? 1 : -1;
    for (const result of merged.values()) result.rows.sort((a, b) => dir * (a.time - b.time));
    return { ranges, results: [...merged.values()] };
  }

  private base(now: number): ExecuteOptions {
    return { now, precision: this.options.precision, excludeSeries: this.options.excludeSeries };
  }

  /** Touched series this query reads, and the times written to them. */
  private relevant(event: WriteEvent): { names: Set<string>; times: number[] } {
    const names = new Set<string>();
    const times: number[] = [];
    const take = (name: string): void => {
      const written = event.touched.get(name);
      if (!written) return;
      names.add(name);
      times.push(...written);
    };

    const { source } = this.query;
    switch (source.kind) {
      case 'series': {
        if (typeof source.pattern === 'string') {
          take(source.pattern);
          break;
        }
        const matcher = compileMatcher(source.pattern);
        for (const name of event.touched.keys()) {
          if (this.options.excludeSeries?.has(name)) continue;
          if (testMatcher(matcher, name)) take(name);
        }
        break;
      }
      case 'merge':
        for (const name of source.names) take(name);
        break;
      case 'join':
        take(source.left.name);
        take(source.right.name);
        break;
    }
    return { names, times };
  }
}
