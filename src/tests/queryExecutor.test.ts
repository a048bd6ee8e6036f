import { describe, it, expect } from 'vitest';
import { executeSelect, toSeriesResult, compileSelect, DEFAULT_LIMIT } from '../query/QueryExecutor.ts';
import type { ExecuteOptions } from '../query/QueryExecutor.ts';
import { parseSelect } from '../query/parseQuery.ts';
import { Database } from '../core/Database.ts';
import { Logger } from '../util/logger.ts';
import type { SeriesResult, Value, WriteBatch } from '../types/series.ts';

// Hour-aligned base time (seconds) and a "now" 55 minutes later.
const B = 1_311_832_800;
const NOW = (B + 3300) * 1000;

function batch(series: string, rows: Array<[number, Record<string, Value>]>): WriteBatch {
  return { series, points: rows.map(([seconds, values]) => ({ time: seconds * 1000, values })) };
}

function makeDb(): Database {
  const db = new Database('test', { logger: new Logger({ level: 'silent' }), clock: () => NOW });
  db.write([
    batch('cpu.idle', [
      [1311836008, { value: 1 }],
      [1311836009, { value: 2 }],
      [1311836010, { value: 3 }],
      [1311836011, { value: 5 }],
      [1311836012, { value: 6 }],
    ]),
    batch('cpu.user', [[1311836010, { value: 50 }]]),
    batch('users.events', [
      [1311836012, { email: 'paul@example.com', type: 'click', target: '/foo' }],
      [1311836012, { email: 'todd@example.com', type: 'click', target: '/asdf' }],
      [1311836008, { email: 'paul@example.com', type: 'click', target: '/jkl' }],
    ]),
    batch('response_times', [
      [B, { value: 10 }],
      [B + 60, { value: 20 }],
      [B + 600, { value: 30 }],
      [B + 660, { value: 40 }],
      [B + 1200, { value: 50 }],
    ]),
    batch('newsletter.signups', [[B + 100, { value: 1 }], [B + 200, { value: 1 }]]),
    batch('user.signups', [[B + 150, { value: 1 }], [B + 3000, { value: 1 }]]),
    batch('memory.total', [[B, { value: 100 }], [B + 60, { value: 100 }]]),
    batch('memory.used', [[B + 5, { value: 40 }], [B + 65, { value: 70 }]]),
  ]);
  return db;
}

function run(db: Database, query: string, options: Partial<ExecuteOptions> = {}): SeriesResult[] {
  return executeSelect(db, parseSelect(query), { now: NOW, ...options }).map((r) => toSeriesResult(r));
}

describe('executeSelect', () => {
  describe('raw selections', () => {
    it('returns points newest first with value and time columns', () => {
      expect(run(makeDb(), 'select value from=cpu.idle where time>now()-1d')).toEqual([
        {
          series: 'cpu.idle',
          columns: ['value', 'time'],
          datapoints: [
            [6, 1311836012],
            [5, 1311836011],
            [3, 1311836010],
            [2, 1311836009],
            [1, 1311836008],
          ],
        },
      ]);
    });

    it('defaults to the last hour', () => {
      const db = makeDb();
      db.write([batch('disk', [[B - 4000, { value: 1 }], [B + 3000, { value: 2 }]])]);
      expect(run(db, 'select value from disk')[0]?.datapoints).toEqual([[2, B + 3000]]);
    });

    it('applies the default limit of 1000 per series', () => {
      const db = makeDb();
      db.write([batch('busy', Array.from({ length: 1005 }, (_, i): [number, Record<string, Value>] => [B + i, { value: i }]))]);
      const [result] = run(db, 'select value from busy');
      expect(DEFAULT_LIMIT).toBe(1000);
      expect(result?.datapoints).toHaveLength(1000);
      expect(result?.datapoints[0]).toEqual([1004, B + 1004]);
    });

    it('honours limit and ascending order', () => {
      expect(run(makeDb(), 'select value from cpu.idle where time>now()-1d order asc limit 2')[0]?.datapoints).toEqual([
        [1, 1311836008],
        [2, 1311836009],
      ]);
    });

    it('returns one result per matching series, sorted by name', () => {
      expect(run(makeDb(), 'select value from cpu.* where time>now()-1d limit 1')).toEqual([
        { series: 'cpu.idle', columns: ['value', 'time'], datapoints: [[6, 1311836012]] },
        { series: 'cpu.user', columns: ['value', 'time'], datapoints: [[50, 1311836010]] },
      ]);
    });

    it('omits series with no rows', () => {
      expect(run(makeDb(), 'select value from nothing.here where time>now()-1d')).toEqual([]);
      expect(run(makeDb(), 'select value from cpu.* where time>now()-1d and value > 1000')).toEqual([]);
    });

    it('filters on the residual where clause', () => {
      expect(run(makeDb(), 'select value from response_times where value > 25 and time > now()-6h')[0]?.datapoints).toEqual([
        [50, B + 1200],
        [40, B + 660],
        [30, B + 600],
      ]);
      expect(
        run(makeDb(), 'select email from users.events where email =~ /^todd/ and time>now()-7d')[0]?.datapoints
      ).toEqual([['todd@example.com', 1311836012]]);
    });

    it('expands * to the series columns and breaks time ties by newest write', () => {
      expect(run(makeDb(), 'select * from users.events where time>now()-7d limit 1')).toEqual([
        {
          series: 'users.events',
          columns: ['email', 'type', 'target', 'time'],
          datapoints: [['todd@example.com', 'click', '/asdf', 1311836012]],
        },
      ]);
    });

    it('skips rows whose selected columns are all null', () => {
      const db = makeDb();
      db.write([batch('mixed', [[B, { value: 1 }], [B + 1, { other: 2 }]])]);
      expect(run(db, 'select value from mixed where time>now()-1d')[0]?.datapoints).toEqual([[1, B]]);
    });

    it('evaluates arithmetic per row', () => {
      expect(run(makeDb(), 'select value * 10 as scaled from cpu.idle where time>now()-1d limit 1')).toEqual([
        { series: 'cpu.idle', columns: ['scaled', 'time'], datapoints: [[60, 1311836012]] },
      ]);
    });
  });

  describe('aggregation', () => {
    it('splits groups by a dimension column', () => {
      expect(run(makeDb(), 'select count(*) from users.events group_by email where time>now()-7d')).toEqual([
        {
          series: 'users.events',
          columns: ['count', 'time', 'email'],
          datapoints: [
            [2, 1311836012, 'paul@example.com'],
            [1, 1311836012, 'todd@example.com'],
          ],
        },
      ]);
    });

    it('buckets by time and dimension together', () => {
      expect(
        run(makeDb(), 'select count(*) from users.events group_by email,time(1h) where time>now()-7d')[0]?.datapoints
      ).toEqual([
        [2, 1311832800, 'paul@example.com'],
        [1, 1311832800, 'todd@example.com'],
      ]);
    });

    it('buckets by floor(time / interval) newest bucket first', () => {
      expect(run(makeDb(), 'select mean(value) from response_times group_by time(10m) where time>now()-6h')).toEqual([
        {
          series: 'response_times',
          columns: ['mean', 'time'],
          datapoints: [
            [50, B + 1200],
            [35, B + 600],
            [15, B],
          ],
        },
      ]);
    });

    it('combines aggregates with arithmetic and stamps the newest time without buckets', () => {
      expect(run(makeDb(), 'select mean(value) * 2 as double, count(value) from response_times where time>now()-6h')).toEqual([
        { series: 'response_times', columns: ['double', 'count', 'time'], datapoints: [[60, 5, B + 1200]] },
      ]);
    });

    it('keeps the top and bottom groups per bucket', () => {
      const top = run(makeDb(), 'select top(1, count(*)) from=users.events group_by email,time(1h) where time>now()-7d');
      expect(top).toEqual([
        { series: 'users.events', columns: ['top', 'time', 'email'], datapoints: [[2, 1311832800, 'paul@example.com']] },
      ]);
      const bottom = run(makeDb(), 'select bottom(1, count(*)) from users.events group_by email,time(1h) where time>now()-7d');
      expect(bottom[0]?.datapoints).toEqual([[1, 1311832800, 'todd@example.com']]);
    });

    it('returns one row per distinct value', () => {
      expect(run(makeDb(), 'select distinct(email) from users.events where time>now()-7d')).toEqual([
        {
          series: 'users.events',
          columns: ['distinct', 'time'],
          datapoints: [
            ['paul@example.com', 1311836012],
            ['todd@example.com', 1311836012],
          ],
        },
      ]);
    });

    it('counts distinct values', () => {
      expect(run(makeDb(), 'select count(distinct(email)) from users.events where time>now()-1d')[0]?.datapoints).toEqual([
        [2, 1311836012],
      ]);
    });
  });

  describe('merge and join', () => {
    it('merges several series into one result', () => {
      expect(
        run(makeDb(), 'select count(*) from merge(newsletter.signups,user.signups) group_by time(1h) where time>now()-1d')
      ).toEqual([{ series: 'newsletter.signups_merge_user.signups', columns: ['count', 'time'], datapoints: [[4, B]] }]);
    });

    it('orders merged raw points by time', () => {
      const [result] = run(makeDb(), 'select value from merge(newsletter.signups, user.signups) where time>now()-1d order asc');
      expect(result?.datapoints.map((row) => row[1])).toEqual([B + 100, B + 150, B + 200, B + 3000]);
    });

    it('diffs two joined series per time bucket', () => {
      expect(
        run(
          makeDb(),
          'select diff(t1.value, t2.value) from inner_join(memory.total, t1, memory.used, t2) group_by time(1m) where time>now()-6h'
        )
      ).toEqual([
        {
          series: 'memory.total_join_memory.used',
          columns: ['diff', 'time'],
          datapoints: [
            [30, B + 60],
            [60, B],
          ],
        },
      ]);
    });

    it('joins on exact time without a bucket', () => {
      const db = makeDb();
      db.write([batch('a', [[B, { value: 1 }], [B + 1, { value: 2 }]]), batch('b', [[B + 1, { value: 10 }]])]);
      expect(run(db, 'select x.value + y.value as total from inner_join(a, x, b, y) where time>now()-1d')).toEqual([
        { series: 'a_join_b', columns: ['total', 'time'], datapoints: [[12, B + 1]] },
      ]);
    });
  });

  describe('options', () => {
    it('keeps only rows written after a sequence number', () => {
      const db = makeDb();
      const event = db.write([batch('cpu.idle', [[1311836005, { value: 9 }]])]);
      expect(run(db, 'select value from cpu.idle where time>now()-1d', { afterSequence: event.afterSequence })).toEqual([
        { series: 'cpu.idle', columns: ['value', 'time'], datapoints: [[9, 1311836005]] },
      ]);
    });

    it('restricts and excludes pattern sources', () => {
      const db = makeDb();
      expect(run(db, 'select value from cpu.* where time>now()-1d', { onlySeries: new Set(['cpu.user']) }).map((r) => r.series))
        .toEqual(['cpu.user']);
      expect(run(db, 'select value from cpu.* where time>now()-1d', { excludeSeries: new Set(['cpu.user']) }).map((r) => r.series))
        .toEqual(['cpu.idle']);
    });

    it('renders times in milliseconds on request', () => {
      const [result] = executeSelect(makeDb(), parseSelect('select value from cpu.user where time>now()-1d'), { now: NOW });
      expect(result && toSeriesResult(result, 'ms').datapoints).toEqual([[50, 1311836010000]]);
    });
  });

  describe('validation', () => {
    it('rejects a plain column next to an aggregate unless grouped by it', () => {
      expect(() => compileSelect(parseSelect('select value, count(*) from cpu.idle'))).toThrow(
        /Column 'value' must be aggregated or listed in group_by/
      );
      expect(() => compileSelect(parseSelect('select email, count(*) from users.events group_by email'))).not.toThrow();
    });

    it('rejects grouping without an aggregate', () => {
      expect(() => compileSelect(parseSelect('select value from cpu group_by host'))).toThrow(/needs an aggregate/);
      expect(() => compileSelect(parseSelect('select value from cpu group_by time(1m)'))).toThrow(/needs an aggregate/);
    });

    it('rejects distinct() alongside other fields', () => {
      expect(() => compileSelect(parseSelect('select distinct(email), count(*) from users.events'))).toThrow(
        /distinct\(\) must be the only selected field/
      );
    });

    it('rejects top() that does not wrap a whole field', () => {
      expect(() => compileSelect(parseSelect('select top(2, count(*)) * 2 from cpu'))).toThrow(/must wrap a whole select field/);
    });

    it('rejects unknown functions in fields and in where', () => {
      expect(() => compileSelect(parseSelect('select foo(value) from cpu'))).toThrow('Unknown function foo()');
      expect(() => compileSelect(parseSelect('select sum(foo(value)) from cpu'))).toThrow('Unknown function foo()');
      expect(() => compileSelect(parseSelect('select value from cpu where foo(value) > 1'))).toThrow('Unknown function foo()');
      expect(() => compileSelect(parseSelect('select value from cpu where count(value) > 1'))).toThrow(
        'count() is not allowed in where'
      );
      expect(() => compileSelect(parseSelect('select diff(value) from cpu'))).toThrow('diff() takes 2 arguments');
    });
  });
});
