/**
 * A single named series: its column list and its points, kept sorted by
 * (time, sequence) ascending. Writes are mostly appends; out-of-order
 * points are placed with a binary search.
 */

import type { Point, Value } from '../types/series.ts';

export class Series {
  readonly columns: string[] = [];
  private readonly columnIndex = new Map<string, number>();
  private points: Point[] = [];

  constructor(readonly name: string, columns: readonly string[] = []) {
    for (const c of columns) this.ensureColumn(c);
  }

  get size(): number {
    return this.points.length;
  }

  columnIndexOf(column: string): number | undefined {
    return this.columnIndex.get(column);
  }

  ensureColumn(column: string): number {
    let idx = this.columnIndex.get(column);
    if (idx === undefined) {
      idx = this.columns.length;
      this.columns.push(column);
      this.columnIndex.set(column, idx);
    }
    return idx;
  }

  valueOf(point: Point, column: string): Value {
    const idx = this.columnIndex.get(column);
    if (idx === undefined) return null;
    return point.values[idx] ?? null;
  }

  insert(time: number, sequence: number, values: Record<string, Value>): Point {
    const row: Value[] = new Array<Value>(this.columns.length).fill(null);
    for (const [column, value] of Object.entries(values)) {
      const idx = this.ensureColumn(column);
      row[idx] = value;
    }
    const point: Point = { time, sequence, values: row };

    const last = this.points[this.points.length - 1];
    if (last === undefined || last.time <= time) {
      this.points.push(point);
    } else {
      this.points.splice(upperBound(this.points, time), 0, point);
    }
    return point;
  }

  /** Points with start <= time <= end, oldest first. */
  range(start: number, end: number): Point[] {
    if (start > end) return [];
    return this.points.slice(lowerBound(this.points, start), upperBound(this.points, end));
  }

  all(): readonly Point[] {
    return this.points;
  }

  /** Remove points with start <= time <= end; returns how many were removed. */
  deleteRange(start: number, end: number): number {
    if (start > end) return 0;
    const lo = lowerBound(this.points, start);
    const hi = upperBound(this.points, end);
    if (hi <= lo) return 0;
    this.points.splice(lo, hi - lo);
    return hi - lo;
  }

  /** Replace all points (snapshot load). Input must already be sorted. */
  restore(points: Point[]): void {
    this.points = points;
  }
}

// ─── Binary search over sorted Point[] ──────────────────────────────────────

/** First index whose time is >= t. */
function lowerBound(points: Point[], t: number): number {
  let lo = 0, hi = points.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (points[mid]!.time < t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index whose time is > t. */
function upperBound(points: Point[], t: number): number {
  let lo = 0, hi = points.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (points[mid]!.time <= t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
