import { describe, it, expect } from 'vitest';
import { extractTimeBounds, resolveRange, evalTime, DEFAULT_WINDOW_MS } from '../query/timeRange.ts';
import { parseSelect } from '../query/parseQuery.ts';
import type { Condition } from '../types/query.ts';

const NOW = 1_000_000_000;

function where(clause: string): Condition | undefined {
  return parseSelect(`select value from cpu where ${clause}`).where;
}

describe('extractTimeBounds', () => {
  it('returns open bounds without a where clause', () => {
    expect(extractTimeBounds(undefined, NOW)).toEqual({
      start: undefined,
      end: undefined,
      forever: false,
      residual: undefined,
    });
  });

  it('makes > exclusive and >= inclusive', () => {
    expect(extractTimeBounds(where('time > now() - 1h'), NOW).start).toBe(NOW - 3_600_000 + 1);
    expect(extractTimeBounds(where('time >= now() - 1h'), NOW).start).toBe(NOW - 3_600_000);
  });

  it('reads bare numbers in the request precision', () => {
    const s = extractTimeBounds(where('time >= 100 and time <= 200'), NOW, 's');
    expect([s.start, s.end]).toEqual([100_000, 200_000]);
    const ms = extractTimeBounds(where('time < 1500'), NOW, 'ms');
    expect(ms.end).toBe(1499);
  });

  it('flips comparisons written with time on the right', () => {
    expect(extractTimeBounds(where('100 < time'), NOW).start).toBe(100_001);
  });

  it('pins both bounds for time =', () => {
    const b = extractTimeBounds(where('time = 5'), NOW);
    expect([b.start, b.end]).toEqual([5000, 5000]);
  });

  it('keeps the tightest bound when several are given', () => {
    const b = extractTimeBounds(where('time > 10 and time > 20 and time < 50 and time < 40'), NOW);
    expect([b.start, b.end]).toEqual([20_001, 39_999]);
  });

  it('parses quoted dates', () => {
    expect(extractTimeBounds(where("time > '2011-07-28T06:53:32Z'"), NOW).start).toBe(1_311_836_012_001);
    expect(() => extractTimeBounds(where("time > 'yesterday'"), NOW)).toThrow(/Invalid date 'yesterday'/);
  });

  it('marks time < forever and ignores later upper bounds', () => {
    const b = extractTimeBounds(where('time < forever and time < 5'), NOW);
    expect(b.forever).toBe(true);
    expect(b.end).toBe(Infinity);
  });

  it('rejects forever as a lower bound', () => {
    expect(() => extractTimeBounds(where('time > forever'), NOW)).toThrow(/upper bound/);
  });

  it('returns the rest of the and-chain as the residual filter', () => {
    const b = extractTimeBounds(where("time > 1 and value > 3 and host = 'a'"), NOW);
    expect(b.start).toBe(1001);
    expect(b.residual).toEqual({
      kind: 'and',
      left: { kind: 'compare', op: '>', left: { kind: 'column', name: 'value' }, right: { kind: 'number', value: 3 } },
      right: { kind: 'compare', op: '=', left: { kind: 'column', name: 'host' }, right: { kind: 'string', value: 'a' } },
    });
  });

  it('rejects time conditions under or', () => {
    expect(() => extractTimeBounds(where('time > 1 or value > 3'), NOW)).toThrow(/combined with "and"/);
  });

  it('rejects operators that cannot bound time', () => {
    expect(() => extractTimeBounds(where('time != 5'), NOW)).toThrow(/cannot compare time/);
  });
});

describe('resolveRange', () => {
  it('defaults to the last hour ending now', () => {
    const range = resolveRange(extractTimeBounds(undefined, NOW), NOW);
    expect(range).toEqual({ start: NOW - DEFAULT_WINDOW_MS, end: NOW });
  });

  it('keeps explicit bounds and accepts another default start', () => {
    const range = resolveRange(extractTimeBounds(where('time < 50'), NOW), NOW, -Infinity);
    expect(range).toEqual({ start: -Infinity, end: 49_999 });
  });
});

describe('evalTime', () => {
  it('adds and subtracts durations from now()', () => {
    expect(evalTime({ kind: 'binary', op: '+', left: { kind: 'now' }, right: { kind: 'duration', ms: 5 } }, NOW, 's'))
      .toBe(NOW + 5);
  });

  it('scales microseconds to milliseconds', () => {
    expect(evalTime({ kind: 'number', value: 2500 }, NOW, 'u')).toBe(2.5);
  });

  it('rejects column references', () => {
    expect(() => evalTime({ kind: 'column', name: 'value' }, NOW, 's')).toThrow(/Unsupported time expression/);
  });
});
