/**
 * HTTP API on Hono.
 *
 *   POST   /db                              create database
 *   GET    /db                              list databases
 *   DELETE /db/:db                          drop database
 *   POST   /db/:db/points                   write points
 *   GET    /db/:db/series?q=                query (SSE for `time < forever`)
 *   DELETE /db/:db/series?name=&start=&end= delete points
 *   POST   /db/:db/keys                     add api key
 *   GET    /db/:db/keys                     list api keys
 *   DELETE /db/:db/keys/:key                remove api key
 *   GET    /db/:db/continuous_queries       list continuous queries
 *   DELETE /db/:db/continuous_queries/:id   drop continuous query
 *
 * Api keys arrive as `?api_key=` or `X-Api-Key`. Times use `?time_precision=`.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import type { Engine, RequestContext } from '../core/Engine.ts';
import type { SeriesResult } from '../types/series.ts';
import type { Logger } from '../util/logger.ts';
import { BadRequestError, NotFoundError, toErrorBody } from '../core/errors.ts';

const precisionSchema = z.enum(['s', 'ms', 'u']).default('s');
const createDatabaseSchema = z.object({ name: z.string().min(1) });
const createKeySchema = z.object({
  permission: z.enum(['read', 'write']),
  key: z
    .string()
    .regex(/^[A-Za-z0-9_-]{8,128}$/, 'Keys are 8-128 letters, digits, "_" or "-"')
    .optional(),
});
const timeParam = z.coerce.number().finite().optional();

/** Parse with a zod schema; failures become 400s naming the field. */
function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const path = issue?.path.join('.');
  throw new BadRequestError(`Invalid ${what}${path ? ` (${path})` : ''}: ${issue?.message ?? 'unknown error'}`);
}

async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw new BadRequestError('Request body must be JSON');
  }
}

function requestContext(c: Context): RequestContext {
  return {
    key: c.req.query('api_key') ?? c.req.header('x-api-key'),
    precision: validate(precisionSchema, c.req.query('time_precision'), 'time_precision'),
  };
}

function wantsEventStream(c: Context): boolean {
  return (c.req.header('accept') ?? '').includes('text/event-stream');
}

export function createApp(engine: Engine, logger: Logger): Hono {
  const app = new Hono();
  const log = logger.child('http');

  app.use('*', async (c, next) => {
    const started = performance.now();
    await next();
    log.debug(`${c.req.method} ${c.req.path}`, {
      status: c.res.status,
      ms: Math.round((performance.now() - started) * 100) / 100,
    });
  });

  app.onError((err, c) => {
    const { status, body } = toErrorBody(err);
    if (status >= 500) log.error('Request failed', { path: c.req.path, error: String(err) });
    return Response.json(body, { status });
  });

  app.notFound((c) => {
    const { status, body } = toErrorBody(new NotFoundError(`No route for ${c.req.method} ${c.req.path}`));
    return Response.json(body, { status });
  });

  // ─── Databases ──────────────────────────────────────────────────────────────

  app.post('/db', async (c) => {
    const { name } = validate(createDatabaseSchema, await readJson(c), 'database');
    return c.json(engine.createDatabase(name, requestContext(c)), 201);
  });

  app.get('/db', (c) => c.json(engine.listDatabases(requestContext(c))));

  app.delete('/db/:db', async (c) => {
    await engine.dropDatabase(c.req.param('db'), requestContext(c));
    return c.body(null, 204);
  });

  // ─── Points and queries ─────────────────────────────────────────────────────

  app.post('/db/:db/points', async (c) => {
    const ctx = requestContext(c);
    const db = c.req.param('db');
    engine.getDatabase(db);
    const count = engine.writePoints(db, await readJson(c), ctx);
    log.debug('Wrote points', { db, count });
    return c.body(null, 204);
  });

  app.get('/db/:db/series', (c) => {
    const ctx = requestContext(c);
    const q = c.req.query('q');
    if (!q) throw new BadRequestError('Missing query parameter q');
    const db = c.req.param('db');
    if (wantsEventStream(c) && engine.isStreaming(q, ctx)) {
      return eventStream(c, engine, db, q, ctx, log);
    }
    return c.json(engine.query(db, q, ctx));
  });

  app.delete('/db/:db/series', (c) => {
    const ctx = requestContext(c);
    const name = c.req.query('name');
    if (!name) throw new BadRequestError('Missing query parameter name');
    const start = validate(timeParam, c.req.query('start'), 'start');
    const end = validate(timeParam, c.req.query('end'), 'end');
    engine.deleteSeries(c.req.param('db'), name, { start, end }, ctx);
    return c.body(null, 204);
  });

  // ─── Keys ───────────────────────────────────────────────────────────────────

  app.post('/db/:db/keys', async (c) => {
    const ctx = requestContext(c);
    const db = c.req.param('db');
    engine.getDatabase(db);
    const { permission, key } = validate(createKeySchema, await readJson(c), 'key');
    return c.json(engine.addKey(db, permission, key, ctx), 201);
  });

  app.get('/db/:db/keys', (c) => c.json(engine.listKeys(c.req.param('db'), requestContext(c))));

  app.delete('/db/:db/keys/:key', (c) => {
    engine.removeKey(c.req.param('db'), c.req.param('key'), requestContext(c));
    return c.body(null, 204);
  });

  // ─── Continuous queries ─────────────────────────────────────────────────────

  app.get('/db/:db/continuous_queries', (c) =>
    c.json(engine.listContinuousQueries(c.req.param('db'), requestContext(c)))
  );

  app.delete('/db/:db/continuous_queries/:id', (c) => {
    const id = validate(z.coerce.number().int().positive(), c.req.param('id'), 'continuous query id');
    engine.dropContinuousQuery(c.req.param('db'), id, requestContext(c));
    return c.body(null, 204);
  });

  return app;
}

/**
 * Server-sent events: the initial result, then one `data` frame per write
 * that adds rows. The subscription ends when the client goes away.
 */
function eventStream(c: Context, engine: Engine, db: string, q: string, ctx: RequestContext, log: Logger): Response {
  const encoder = new TextEncoder();
  const frame = (results: SeriesResult[]): Uint8Array => encoder.encode(`data: ${JSON.stringify(results)}\n\n`);
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;

  const subscription = engine.subscribe(
    db,
    q,
    (results) => {
      try {
        controller?.enqueue(frame(results));
      } catch (err) {
        log.debug('Dropping closed event stream', { db, error: String(err) });
        subscription.close();
      }
    },
    ctx
  );

  const readable = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
      c.enqueue(frame(subscription.initial));
    },
    cancel() {
      subscription.close();
    },
  });
  c.req.raw.signal.addEventListener('abort', () => subscription.close());
  log.debug('Opened event stream', { db, q });

  return new Response(readable, {
    status: 200,
    headers: {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    },
  });
}
