/**
 * Binary snapshot of one database.
 *
 * File layout:
 *   "TICK" | version (1 byte) | snappy(body)
 *
 * Body (varint = unsigned LEB128, str = varint length + UTF-8 bytes):
 *   sequence: varint
 *   keys:     varint count, then { key: str, permission: u8 (0 read, 1 write) }
 *   queries:  varint count, then { id: varint, text: str, precision: u8 (0 s, 1 ms, 2 u) }
 *             (version 1 files carry no precision byte; their queries read as s)
 *   series:   varint count, then {
 *               name: str, derived: u8,
 *               columns: varint count, then str
 *               points: varint count, then { time: f64 LE, sequence: varint, value × columns }
 *             }
 *   value:    u8 tag (0 null, 1 false, 2 true, 3 f64 LE, 4 str)
 *
 * Encoding is two-pass: exact size first, then one allocation written in place.
 */

import type { AccessKey, Point, TimePrecision, Value } from '../types/series.ts';
import { writeIntVarint, intVarintSize, readIntVarint } from '../util/varint.ts';
import { snappyCompress, snappyUncompress } from '../compress/snappy.ts';
import { BadRequestError } from '../core/errors.ts';

export const SNAPSHOT_MAGIC = 'TICK';
export const SNAPSHOT_VERSION = 2;
const SUPPORTED_VERSIONS = new Set([1, 2]);

export interface SeriesSnapshot {
  name: string;
  derived: boolean;
  columns: string[];
  points: Point[];
}

export interface ContinuousQuerySnapshot {
  id: number;
  query: string;
  precision: TimePrecision;
}

export interface DatabaseSnapshot {
  sequence: number;
  keys: AccessKey[];
  continuousQueries: ContinuousQuerySnapshot[];
  series: SeriesSnapshot[];
}

const ENC = new TextEncoder();
const DEC = new TextDecoder();

const TAG_NULL = 0;
const TAG_FALSE = 1;
const TAG_TRUE = 2;
const TAG_NUMBER = 3;
const TAG_STRING = 4;

const PRECISIONS: readonly TimePrecision[] = ['s', 'ms', 'u'];

// ─── Size calculation (pass 1) ──────────────────────────────────────────────

function strSize(s: string): number {
  const n = Buffer.byteLength(s);
  return intVarintSize(n) + n;
}

function valueSize(v: Value): number {
  if (typeof v === 'number') return 9;
  if (typeof v === 'string') return 1 + strSize(v);
  return 1;
}

function seriesSize(s: SeriesSnapshot): number {
  let size = strSize(s.name) + 1 + intVarintSize(s.columns.length);
  for (const c of s.columns) size += strSize(c);
  size += intVarintSize(s.points.length);
  for (const p of s.points) {
    size += 8 + intVarintSize(p.sequence);
    for (let i = 0; i < s.columns.length; i++) size += valueSize(p.values[i] ?? null);
  }
  return size;
}

function bodySize(snap: DatabaseSnapshot): number {
  let size = intVarintSize(snap.sequence);
  size += intVarintSize(snap.keys.length);
  for (const k of snap.keys) size += strSize(k.key) + 1;
  size += intVarintSize(snap.continuousQueries.length);
  for (const q of snap.continuousQueries) size += intVarintSize(q.id) + strSize(q.query) + 1;
  size += intVarintSize(snap.series.length);
  for (const s of snap.series) size += seriesSize(s);
  return size;
}

// ─── Write pass (pass 2) ────────────────────────────────────────────────────

function writeStr(buf: Uint8Array, off: number, s: string): number {
  const n = Buffer.byteLength(s);
  off += writeIntVarint(buf, off, n);
  ENC.encodeInto(s, buf.subarray(off));
  return off + n;
}

function writeValue(buf: Uint8Array, view: DataView, off: number, v: Value): number {
  if (v === null) {
    buf[off++] = TAG_NULL;
  } else if (typeof v === 'boolean') {
    buf[off++] = v ? TAG_TRUE : TAG_FALSE;
  } else if (typeof v === 'number') {
    buf[off++] = TAG_NUMBER;
    view.setFloat64(off, v, true /* LE */);
    off += 8;
  } else {
    buf[off++] = TAG_STRING;
    off = writeStr(buf, off, v);
  }
  return off;
}

function writeSeries(buf: Uint8Array, view: DataView, off: number, s: SeriesSnapshot): number {
  off = writeStr(buf, off, s.name);
  buf[off++] = s.derived ? 1 : 0;
  off += writeIntVarint(buf, off, s.columns.length);
  for (const c of s.columns) off = writeStr(buf, off, c);
  off += writeIntVarint(buf, off, s.points.length);
  for (const p of s.points) {
    view.setFloat64(off, p.time, true);
    off += 8;
    off += writeIntVarint(buf, off, p.sequence);
    for (let i = 0; i < s.columns.length; i++) off = writeValue(buf, view, off, p.values[i] ?? null);
  }
  return off;
}

export function encodeSnapshotBody(snap: DatabaseSnapshot): Uint8Array {
  const buf = new Uint8Array(bodySize(snap));
  const view = new DataView(buf.buffer);

  let off = writeIntVarint(buf, 0, snap.sequence);
  off += writeIntVarint(buf, off, snap.keys.length);
  for (const k of snap.keys) {
    off = writeStr(buf, off, k.key);
    buf[off++] = k.permission === 'write' ? 1 : 0;
  }
  off += writeIntVarint(buf, off, snap.continuousQueries.length);
  for (const q of snap.continuousQueries) {
    off += writeIntVarint(buf, off, q.id);
    off = writeStr(buf, off, q.query);
    buf[off++] = PRECISIONS.indexOf(q.precision);
  }
  off += writeIntVarint(buf, off, snap.series.length);
  for (const s of snap.series) off = writeSeries(buf, view, off, s);

  return buf;
}

// ─── Decoding ───────────────────────────────────────────────────────────────

class Reader {
  private off = 0;
  private readonly view: DataView;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get done(): boolean {
    return this.off >= this.buf.length;
  }

  varint(): number {
    const { value, length } = readIntVarint(this.buf, this.off);
    this.off += length;
    return value;
  }

  byte(): number {
    this.need(1);
    return this.buf[this.off++]!;
  }

  f64(): number {
    this.need(8);
    const v = this.view.getFloat64(this.off, true);
    this.off += 8;
    return v;
  }

  str(): string {
    const n = this.varint();
    this.need(n);
    const s = DEC.decode(this.buf.subarray(this.off, this.off + n));
    this.off += n;
    return s;
  }

  precision(): TimePrecision {
    const b = this.byte();
    const p = PRECISIONS[b];
    if (p === undefined) throw new RangeError(`Unknown precision ${b} at offset ${this.off - 1}`);
    return p;
  }

  value(): Value {
    const tag = this.byte();
    switch (tag) {
      case TAG_NULL: return null;
      case TAG_FALSE: return false;
      case TAG_TRUE: return true;
      case TAG_NUMBER: return this.f64();
      case TAG_STRING: return this.str();
      default: throw new RangeError(`Unknown value tag ${tag} at offset ${this.off - 1}`);
    }
  }

  private need(n: number): void {
    if (this.off + n > this.buf.length) throw new RangeError('Snapshot truncated');
  }
}

export function decodeSnapshotBody(buf: Uint8Array, version: number = SNAPSHOT_VERSION): DatabaseSnapshot {
  const r = new Reader(buf);
  const sequence = r.varint();

  const keys: AccessKey[] = [];
  for (let n = r.varint(); n > 0; n--) {
    const key = r.str();
    keys.push({ key, permission: r.byte() === 1 ? 'write' : 'read' });
  }

  const continuousQueries: DatabaseSnapshot['continuousQueries'] = [];
  for (let n = r.varint(); n > 0; n--) {
    const id = r.varint();
    const query = r.str();
    continuousQueries.push({ id, query, precision: version >= 2 ? r.precision() : 's' });
  }

  const series: SeriesSnapshot[] = [];
  for (let n = r.varint(); n > 0; n--) {
    const name = r.str();
    const derived = r.byte() === 1;
    const columns: string[] = [];
    for (let c = r.varint(); c > 0; c--) columns.push(r.str());
    const points: Point[] = [];
    for (let p = r.varint(); p > 0; p--) {
      const time = r.f64();
      const seq = r.varint();
      const values: Value[] = [];
      for (let i = 0; i < columns.length; i++) values.push(r.value());
      points.push({ time, sequence: seq, values });
    }
    series.push({ name, derived, columns, points });
  }

  if (!r.done) throw new RangeError('Trailing bytes after snapshot body');
  return { sequence, keys, continuousQueries, series };
}

// ─── File framing ───────────────────────────────────────────────────────────

export function encodeSnapshot(snap: DatabaseSnapshot): Uint8Array {
  const body = snappyCompress(encodeSnapshotBody(snap));
  const out = new Uint8Array(SNAPSHOT_MAGIC.length + 1 + body.length);
  ENC.encodeInto(SNAPSHOT_MAGIC, out);
  out[SNAPSHOT_MAGIC.length] = SNAPSHOT_VERSION;
  out.set(body, SNAPSHOT_MAGIC.length + 1);
  return out;
}

export function decodeSnapshot(data: Uint8Array): DatabaseSnapshot {
  const magic = DEC.decode(data.subarray(0, SNAPSHOT_MAGIC.length));
  if (magic !== SNAPSHOT_MAGIC) throw new BadRequestError('Not a tickstore snapshot');
  const version = data[SNAPSHOT_MAGIC.length];
  if (version === undefined || !SUPPORTED_VERSIONS.has(version)) {
    throw new BadRequestError(`Unsupported snapshot version ${String(version)}`);
  }
  return decodeSnapshotBody(snappyUncompress(data.subarray(SNAPSHOT_MAGIC.length + 1)), version);
}
