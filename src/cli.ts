#!/usr/bin/env -S npx tsx
/**
 * tickstore CLI
 *
 * Usage:
 *   tickstore serve                      # config from environment / .env
 *   tickstore serve -p 9000 --data-dir ./data
 *   tickstore serve --admin-key test-secret --log-level debug
 */

import { Command } from 'commander';
import { loadConfig } from './core/config.ts';
import { TickStore } from './core/TickStore.ts';
import { serveNode } from './adapters/node.ts';
import { Logger } from './util/logger.ts';

interface ServeOptions {
  port?: string;
  host?: string;
  dataDir?: string;
  adminKey?: string;
  flushInterval?: string;
  logLevel?: string;
}

export const program = new Command()
  .name('tickstore')
  .description('In-memory time-series database with an HTTP API')
  .version('0.1.0', '-v, --version', 'Show version number');

program
  .command('serve')
  .description('Start the HTTP server')
  .option('-p, --port <port>', 'Port to listen on (TICKSTORE_PORT, default 8086)')
  .option('-H, --host <host>', 'Interface to bind (TICKSTORE_HOST, default 0.0.0.0)')
  .option('-d, --data-dir <dir>', 'Snapshot directory (TICKSTORE_DATA_DIR)')
  .option('--admin-key <key>', 'Key required for /db routes (TICKSTORE_ADMIN_KEY)')
  .option('--flush-interval <ms>', 'Snapshot interval in ms (TICKSTORE_FLUSH_INTERVAL_MS, default 10000)')
  .option('--log-level <level>', 'debug | info | warn | error | silent (LOG_LEVEL, default info)')
  .action(async (opts: ServeOptions) => {
    const config = loadConfig({
      port: opts.port,
      host: opts.host,
      dataDir: opts.dataDir,
      adminKey: opts.adminKey,
      flushIntervalMs: opts.flushInterval,
      logLevel: opts.logLevel,
    });
    const logger = new Logger({ level: config.logLevel, context: 'tickstore' });
    const store = TickStore.fromConfig(config).logger(logger).build();
    const server = await serveNode(store, { port: config.port, host: config.host, logger });

    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, shutting down`);
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('Shutdown failed', { error: String(err) });
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
