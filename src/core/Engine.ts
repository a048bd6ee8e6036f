/**
 * The database registry behind the HTTP API.
 *
 * Every operation takes the caller's api key and checks it against the
 * target database (or the admin key for /db routes) before touching data.
 * With a data directory, dirty databases are snapshotted every flush
 * interval and on stop.
 */

import type { AccessKey, Permission, SeriesResult, TimePrecision } from '../types/series.ts';
import { parseQuery, parseSelect } from '../query/parseQuery.ts';
import { extractTimeBounds, PRECISION_MS } from '../query/timeRange.ts';
import { parseNamePattern } from '../transform/SeriesMatcher.ts';
import { parseWriteBody } from '../transform/parsePoints.ts';
import { SnapshotStore } from '../storage/SnapshotStore.ts';
import type { Logger } from '../util/logger.ts';
import { BadRequestError, ConflictError, ForbiddenError, NotFoundError, UnauthorizedError } from './errors.ts';
import { Database, DATABASE_NAME, requiredPermission } from './Database.ts';
import type { Subscription } from './Database.ts';

export interface EngineOptions {
  dataDir?: string;
  adminKey?: string;
  flushIntervalMs: number;
  logger: Logger;
  clock: () => number;
}

/** Who is calling and how times are written on the wire. */
export interface RequestContext {
  key?: string;
  precision?: TimePrecision;
}

export class Engine {
  private readonly databases = new Map<string, Database>();
  private readonly store: SnapshotStore | undefined;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | undefined;
  private flushing: Promise<void> | undefined;

  constructor(private readonly options: EngineOptions) {
    this.logger = options.logger;
    this.store = options.dataDir ? new SnapshotStore(options.dataDir) : undefined;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /** Load snapshots and start the flush timer. */
  async start(): Promise<void> {
    if (!this.store) return;
    for (const name of await this.store.list()) {
      const snap = await this.store.load(name);
      this.databases.set(name, Database.fromSnapshot(name, snap, this.dbOptions()));
      this.logger.info('Loaded database', { name, series: snap.series.length });
    }
    if (this.options.flushIntervalMs > 0) {
      this.timer = setInterval(() => {
        this.flush().catch((err: unknown) => this.logger.error('Snapshot flush failed', { error: String(err) }));
      }, this.options.flushIntervalMs);
      this.timer.unref();
    }
  }

  /** Stop the timer and write a final snapshot. */
  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    await this.flush();
  }

  /** Snapshot every dirty database. Concurrent calls share one run. */
  async flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.flushDirty().finally(() => {
        this.flushing = undefined;
      });
    }
    return this.flushing;
  }

  private async flushDirty(): Promise<void> {
    const store = this.store;
    if (!store) return;
    for (const db of [...this.databases.values()]) {
      if (!db.dirty) continue;
      db.dirty = false;
      try {
        const bytes = await store.save(db.name, db.toSnapshot());
        this.logger.debug('Saved snapshot', { name: db.name, bytes });
      } catch (err) {
        db.dirty = true;
        throw err;
      }
      // dropped (or dropped and re-created) while the save was in flight
      const current = this.databases.get(db.name);
      if (current === undefined) await store.remove(db.name);
      else if (current !== db) current.dirty = true;
    }
  }

  private dbOptions(): { logger: Logger; clock: () => number } {
    return { logger: this.logger, clock: this.options.clock };
  }

  // ─── Administration ─────────────────────────────────────────────────────────

  authorizeAdmin(key: string | undefined): void {
    const adminKey = this.options.adminKey;
    if (!adminKey) return;
    if (key === undefined || key === '') throw new UnauthorizedError();
    if (key !== adminKey) throw new ForbiddenError();
  }

  createDatabase(name: string, ctx: RequestContext = {}): { name: string } {
    this.authorizeAdmin(ctx.key);
    if (!DATABASE_NAME.test(name)) throw new BadRequestError(`Invalid database name '${name}'`);
    if (this.databases.has(name)) throw new ConflictError(`Database '${name}' already exists`);
    const db = new Database(name, this.dbOptions());
    db.dirty = true;
    this.databases.set(name, db);
    this.logger.info('Created database', { name });
    return { name };
  }

  listDatabases(ctx: RequestContext = {}): Array<{ name: string }> {
    this.authorizeAdmin(ctx.key);
    return [...this.databases.keys()].sort().map((name) => ({ name }));
  }

  async dropDatabase(name: string, ctx: RequestContext = {}): Promise<void> {
    this.authorizeAdmin(ctx.key);
    if (!this.databases.delete(name)) throw new NotFoundError(`Database '${name}' not found`);
    await this.store?.remove(name);
    this.logger.info('Dropped database', { name });
  }

  getDatabase(name: string): Database {
    const db = this.databases.get(name);
    if (!db) throw new NotFoundError(`Database '${name}' not found`);
    return db;
  }

  /** Open the database after checking the caller may do `needed` on it. */
  private open(name: string, ctx: RequestContext, needed: Permission): Database {
    const db = this.getDatabase(name);
    db.authorize(ctx.key, needed);
    return db;
  }

  /** Key management takes the admin key when one is set, a write key otherwise. */
  private openForKeys(name: string, ctx: RequestContext): Database {
    if (this.options.adminKey) {
      this.authorizeAdmin(ctx.key);
      return this.getDatabase(name);
    }
    return this.open(name, ctx, 'write');
  }

  addKey(name: string, permission: Permission, key: string | undefined, ctx: RequestContext = {}): AccessKey {
    return this.openForKeys(name, ctx).addKey(permission, key);
  }

  listKeys(name: string, ctx: RequestContext = {}): AccessKey[] {
    return this.openForKeys(name, ctx).listKeys();
  }

  removeKey(name: string, key: string, ctx: RequestContext = {}): void {
    this.openForKeys(name, ctx).removeKey(key);
  }

  // ─── Data ───────────────────────────────────────────────────────────────────

  writePoints(name: string, body: unknown, ctx: RequestContext = {}): number {
    const db = this.open(name, ctx, 'write');
    const batches = parseWriteBody(body, ctx.precision ?? 's', this.options.clock());
    const event = db.write(batches);
    let count = 0;
    for (const times of event.touched.values()) count += times.length;
    return count;
  }

  query(name: string, text: string, ctx: RequestContext = {}): SeriesResult[] {
    const db = this.getDatabase(name);
    const stmt = parseQuery(text);
    db.authorize(ctx.key, requiredPermission(stmt));
    return db.execute(stmt, ctx.precision);
  }

  /** True when a query should be streamed rather than run once. */
  isStreaming(text: string, ctx: RequestContext = {}): boolean {
    const stmt = parseQuery(text);
    if (stmt.type !== 'select' || stmt.into !== undefined) return false;
    return extractTimeBounds(stmt.where, this.options.clock(), ctx.precision).forever;
  }

  subscribe(
    name: string,
    text: string,
    onResults: (results: SeriesResult[]) => void,
    ctx: RequestContext = {}
  ): Subscription {
    const db = this.open(name, ctx, 'read');
    return db.subscribe(parseSelect(text), ctx.precision ?? 's', onResults);
  }

  /**
   * Delete points by series name (literal or `/regex/`) and an optional
   * inclusive time range in the request precision.
   */
  deleteSeries(
    name: string,
    series: string,
    range: { start?: number; end?: number },
    ctx: RequestContext = {}
  ): number {
    const db = this.open(name, ctx, 'write');
    const unit = PRECISION_MS[ctx.precision ?? 's'];
    return db.deleteSeries(parseNamePattern(series), {
      start: range.start === undefined ? -Infinity : Math.ceil(range.start * unit),
      end: range.end === undefined ? Infinity : Math.floor(range.end * unit),
    });
  }

  listContinuousQueries(name: string, ctx: RequestContext = {}): Array<{ id: number; query: string }> {
    return this.open(name, ctx, 'read').listContinuous();
  }

  dropContinuousQuery(name: string, id: number, ctx: RequestContext = {}): void {
    this.open(name, ctx, 'write').dropContinuous(id);
  }
}
