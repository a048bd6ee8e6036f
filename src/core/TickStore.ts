// TickStore fluent builder and built instance.
//
// Usage:
//   const store = new TickStore()
//     .dataDir('./data')
//     .adminKey(process.env.TICKSTORE_ADMIN_KEY)
//     .flushInterval(10_000)
//     .build();
//
//   await store.start();
//   serve({ fetch: store.fetchHandler(), port: 8086 });

import type { Hono } from 'hono';
import { Engine } from './Engine.ts';
import { createApp } from '../adapters/http.ts';
import { Logger } from '../util/logger.ts';
import type { LogLevel } from '../util/logger.ts';
import type { ServerConfig } from './config.ts';

/** TickStore fluent builder. */
export class TickStore {
  private _dataDir?: string;
  private _adminKey?: string;
  private _flushIntervalMs = 10_000;
  private _logger?: Logger;
  private _logLevel: LogLevel = 'info';
  private _clock: () => number = Date.now;

  /** Builder preloaded from a resolved server config. */
  static fromConfig(config: ServerConfig): TickStore {
    const builder = new TickStore().flushInterval(config.flushIntervalMs).logLevel(config.logLevel);
    if (config.dataDir) builder.dataDir(config.dataDir);
    if (config.adminKey) builder.adminKey(config.adminKey);
    return builder;
  }

  /** Persist snapshots under this directory. Without one, data lives only in memory. */
  dataDir(dir: string): this {
    this._dataDir = dir;
    return this;
  }

  /** Require this key for /db administration routes. Empty or undefined disables it. */
  adminKey(key: string | undefined): this {
    this._adminKey = key || undefined;
    return this;
  }

  /**
   * How often dirty databases are snapshotted, in milliseconds.
   * 0 snapshots only on stop().
   */
  flushInterval(ms: number): this {
    if (!Number.isFinite(ms) || ms < 0) throw new Error('TickStore: flushInterval must be >= 0');
    this._flushIntervalMs = ms;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /** Level for the default logger; ignored when logger() is given. */
  logLevel(level: LogLevel): this {
    this._logLevel = level;
    return this;
  }

  /** Millisecond clock used for `now()`, default times and retention windows. */
  clock(clock: () => number): this {
    this._clock = clock;
    return this;
  }

  build(): BuiltTickStore {
    const logger = this._logger ?? new Logger({ level: this._logLevel, context: 'tickstore' });
    const engine = new Engine({
      dataDir: this._dataDir,
      adminKey: this._adminKey,
      flushIntervalMs: this._flushIntervalMs,
      logger,
      clock: this._clock,
    });
    return new BuiltTickStore(engine, createApp(engine, logger));
  }
}

/** A configured TickStore ready to serve requests. */
export class BuiltTickStore {
  constructor(
    readonly engine: Engine,
    readonly app: Hono
  ) {}

  /**
   * Web fetch handler for any runtime that speaks Request/Response.
   *
   * Usage: serve({ fetch: store.fetchHandler() })
   */
  fetchHandler(): (req: Request) => Promise<Response> {
    return async (req: Request): Promise<Response> => this.app.fetch(req);
  }

  /** Load snapshots from the data directory and start periodic flushing. */
  start(): Promise<void> {
    return this.engine.start();
  }

  /** Flush snapshots and stop the timer. */
  stop(): Promise<void> {
    return this.engine.stop();
  }
}
