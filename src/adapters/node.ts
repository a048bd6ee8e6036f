/**
 * Node.js server for a built TickStore.
 */

import { serve } from '@hono/node-server';
import type { BuiltTickStore } from '../core/TickStore.ts';
import type { Logger } from '../util/logger.ts';

export interface NodeServerOptions {
  port: number;
  host: string;
  logger: Logger;
}

export interface RunningServer {
  close(): Promise<void>;
}

/** Start the store, listen, and return a handle that flushes on close. */
export async function serveNode(store: BuiltTickStore, options: NodeServerOptions): Promise<RunningServer> {
  await store.start();
  const server = serve({ fetch: store.app.fetch, port: options.port, hostname: options.host }, (info) => {
    options.logger.info(`Listening on http://${info.address}:${info.port}`);
  });

  return {
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await store.stop();
      options.logger.info('Server stopped');
    },
  };
}
