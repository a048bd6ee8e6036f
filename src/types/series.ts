/**
 * Stored data structures: values, points, series and wire payloads.
 */

export type Value = number | string | boolean | null;

export interface Point {
  time: number; // milliseconds since epoch
  sequence: number;
  values: Value[]; // aligned with the owning series' columns
}

/** A point as written, before it is assigned a sequence number. */
export interface IncomingPoint {
  time: number;
  values: Record<string, Value>;
}

export interface WriteBatch {
  series: string;
  points: IncomingPoint[];
}

/** The JSON shape returned by the query endpoint. */
export interface SeriesResult {
  series: string;
  columns: string[];
  datapoints: Value[][];
}

export type TimePrecision = 's' | 'ms' | 'u';

export type Permission = 'read' | 'write';

export interface AccessKey {
  key: string;
  permission: Permission;
}
