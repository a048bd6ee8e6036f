import { describe, it, expect } from 'vitest';
import { TickStore } from '../core/TickStore.ts';
import type { BuiltTickStore } from '../core/TickStore.ts';
import { Logger } from '../util/logger.ts';

const NOW = 1_311_836_100_000;

function makeStore(adminKey?: string): BuiltTickStore {
  return new TickStore()
    .clock(() => NOW)
    .logger(new Logger({ level: 'silent' }))
    .adminKey(adminKey)
    .build();
}

async function call(
  store: BuiltTickStore,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  return store.fetchHandler()(
    new Request(`http://localhost${path}`, {
      method,
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
      headers: { 'Content-Type': 'application/json', ...headers },
    })
  );
}

function seriesPath(db: string, q: string, extra: Record<string, string> = {}): string {
  return `/db/${db}/series?${new URLSearchParams({ q, ...extra }).toString()}`;
}

const cpuIdle = [
  {
    series: 'cpu.idle',
    points: [
      [1311836008, 1],
      [1311836009, 2],
      [1311836010, 3],
      [1311836011, 5],
      [1311836012, 6],
    ],
  },
];

async function withCpuIdle(): Promise<BuiltTickStore> {
  const store = makeStore();
  await call(store, 'POST', '/db', { name: 'site_dev' });
  await call(store, 'POST', '/db/site_dev/points', cpuIdle);
  return store;
}

describe('HTTP API', () => {
  describe('points and queries', () => {
    it('creates a database, writes points and queries them back', async () => {
      const store = makeStore();
      const created = await call(store, 'POST', '/db', { name: 'site_dev' });
      expect(created.status).toBe(201);
      expect(await created.json()).toEqual({ name: 'site_dev' });

      const written = await call(store, 'POST', '/db/site_dev/points', cpuIdle);
      expect(written.status).toBe(204);

      const res = await call(store, 'GET', seriesPath('site_dev', 'select value from=cpu.idle where time>now()-1d'));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([
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

    it('groups by a column written through extra_columns', async () => {
      const store = makeStore();
      await call(store, 'POST', '/db', { name: 'site_dev' });
      await call(store, 'POST', '/db/site_dev/points', [
        {
          series: 'users.events',
          extra_columns: ['email', 'type', 'target'],
          points: [
            [1311836012, 'paul@example.com', 'click', '/foo'],
            [1311836012, 'todd@example.com', 'click', '/asdf'],
            [1311836008, 'paul@example.com', 'click', '/jkl'],
          ],
        },
      ]);
      const res = await call(
        store,
        'GET',
        seriesPath('site_dev', 'select count(*) from users.events group_by email where time>now()-7d')
      );
      expect(await res.json()).toEqual([
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

    it('reads and writes times in the requested precision', async () => {
      const store = await withCpuIdle();
      await call(store, 'POST', '/db/site_dev/points?time_precision=ms', [
        { series: 'cpu.user', points: [[1311836012500, 9]] },
      ]);
      const res = await call(
        store,
        'GET',
        seriesPath('site_dev', 'select value from cpu.user where time>now()-1h', { time_precision: 'ms' })
      );
      expect(await res.json()).toEqual([{ series: 'cpu.user', columns: ['value', 'time'], datapoints: [[9, 1311836012500]] }]);
    });

    it('lists series', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'GET', seriesPath('site_dev', 'list series'));
      expect(await res.json()).toEqual([
        { series: 'list_series_result', columns: ['time', 'name'], datapoints: [[0, 'cpu.idle']] },
      ]);
    });

    it('deletes points by name and time range', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'DELETE', '/db/site_dev/series?name=cpu.idle&start=1311836010&end=1311836011');
      expect(res.status).toBe(204);
      const after = await call(store, 'GET', seriesPath('site_dev', 'select value from cpu.idle where time>now()-1d'));
      expect(await after.json()).toEqual([
        {
          series: 'cpu.idle',
          columns: ['value', 'time'],
          datapoints: [
            [6, 1311836012],
            [2, 1311836009],
            [1, 1311836008],
          ],
        },
      ]);
    });
  });

  describe('errors', () => {
    it('reports query syntax errors with their position', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'GET', seriesPath('site_dev', 'select value form cpu'));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'QUERY_SYNTAX', message: expect.stringMatching(/at position 13$/) },
      });
    });

    it('rejects a missing query', async () => {
      const res = await call(await withCpuIdle(), 'GET', '/db/site_dev/series');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'Missing query parameter q' } });
    });

    it('returns 404 for unknown databases and routes', async () => {
      const store = makeStore();
      const res = await call(store, 'GET', seriesPath('nope', 'list series'));
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: "Database 'nope' not found" } });
      const route = await call(store, 'GET', '/nowhere');
      expect(await route.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'No route for GET /nowhere' } });
    });

    it('rejects duplicate and invalid database names', async () => {
      const store = await withCpuIdle();
      expect((await call(store, 'POST', '/db', { name: 'site_dev' })).status).toBe(409);
      const invalid = await call(store, 'POST', '/db', { name: 'bad name' });
      expect(await invalid.json()).toEqual({ error: { code: 'BAD_REQUEST', message: "Invalid database name 'bad name'" } });
    });

    it('rejects bodies that are not JSON', async () => {
      const res = await call(await withCpuIdle(), 'POST', '/db/site_dev/points', 'not json');
      expect(await res.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'Request body must be JSON' } });
    });

    it('rejects unknown functions before running a query', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'GET', seriesPath('site_dev', 'select foo(value) from cpu.idle'));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'Unknown function foo()' } });

      const stream = await call(store, 'GET', seriesPath('site_dev', 'select foo(value) from cpu.idle where time<forever'), undefined, {
        Accept: 'text/event-stream',
      });
      expect(stream.status).toBe(400);
      expect(await stream.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'Unknown function foo()' } });
    });

    it('rejects a series name that is not a valid pattern', async () => {
      const res = await call(await withCpuIdle(), 'DELETE', '/db/site_dev/series?name=cpu%5B');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'BAD_REQUEST', message: expect.stringMatching(/^Invalid series pattern 'cpu\[': /) },
      });
    });

    it('rejects an unknown time precision', async () => {
      const res = await call(await withCpuIdle(), 'GET', seriesPath('site_dev', 'list series', { time_precision: 'h' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'BAD_REQUEST', message: expect.stringMatching(/^Invalid time_precision/) },
      });
    });
  });

  describe('api keys', () => {
    it('opens a database until a key is added', async () => {
      const store = await withCpuIdle();
      const added = await call(store, 'POST', '/db/site_dev/keys', { permission: 'write', key: 'test-secret' });
      expect(added.status).toBe(201);
      expect(await added.json()).toEqual({ key: 'test-secret', permission: 'write' });

      const missing = await call(store, 'POST', '/db/site_dev/points', cpuIdle);
      expect(missing.status).toBe(401);
      expect(await missing.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Missing api key' } });

      const wrong = await call(store, 'POST', '/db/site_dev/points?api_key=wrong-key', cpuIdle);
      expect(wrong.status).toBe(403);

      expect((await call(store, 'POST', '/db/site_dev/points?api_key=test-secret', cpuIdle)).status).toBe(204);
    });

    it('keeps read keys away from writes', async () => {
      const store = await withCpuIdle();
      await call(store, 'POST', '/db/site_dev/keys', { permission: 'write', key: 'test-secret' });
      const reader = await call(
        store,
        'POST',
        '/db/site_dev/keys',
        { permission: 'read', key: 'test-reader' },
        { 'X-Api-Key': 'test-secret' }
      );
      expect(reader.status).toBe(201);

      const write = await call(store, 'POST', '/db/site_dev/points', cpuIdle, { 'X-Api-Key': 'test-reader' });
      expect(write.status).toBe(403);
      expect(await write.json()).toEqual({ error: { code: 'FORBIDDEN', message: 'Api key is read-only' } });

      const read = await call(store, 'GET', seriesPath('site_dev', 'list series', { api_key: 'test-reader' }));
      expect(read.status).toBe(200);

      const into = await call(
        store,
        'GET',
        seriesPath('site_dev', 'select value from cpu.idle into cpu.copy', { api_key: 'test-reader' })
      );
      expect(into.status).toBe(403);
    });

    it('lists, generates and removes keys', async () => {
      const store = await withCpuIdle();
      await call(store, 'POST', '/db/site_dev/keys', { permission: 'write', key: 'test-secret' });
      const auth = { 'X-Api-Key': 'test-secret' };

      const generated = await call(store, 'POST', '/db/site_dev/keys', { permission: 'read' }, auth);
      expect(await generated.json()).toEqual({ key: expect.stringMatching(/^[0-9a-f]{32}$/), permission: 'read' });
      const key = store.engine.getDatabase('site_dev').listKeys()[1]?.key ?? '';

      const listed = await call(store, 'GET', '/db/site_dev/keys', undefined, auth);
      expect(await listed.json()).toEqual([
        { key: 'test-secret', permission: 'write' },
        { key, permission: 'read' },
      ]);

      expect((await call(store, 'DELETE', `/db/site_dev/keys/${key}`, undefined, auth)).status).toBe(204);
      expect((await call(store, 'DELETE', `/db/site_dev/keys/${key}`, undefined, auth)).status).toBe(404);
    });

    it('validates supplied keys', async () => {
      const res = await call(await withCpuIdle(), 'POST', '/db/site_dev/keys', { permission: 'write', key: 'short' });
      expect(await res.json()).toEqual({
        error: { code: 'BAD_REQUEST', message: 'Invalid key (key): Keys are 8-128 letters, digits, "_" or "-"' },
      });
    });
  });

  describe('admin key', () => {
    it('guards database administration', async () => {
      const store = makeStore('test-admin');
      expect((await call(store, 'POST', '/db', { name: 'metrics' })).status).toBe(401);
      expect((await call(store, 'POST', '/db', { name: 'metrics' }, { 'X-Api-Key': 'wrong-key' })).status).toBe(403);

      const admin = { 'X-Api-Key': 'test-admin' };
      expect((await call(store, 'POST', '/db', { name: 'metrics' }, admin)).status).toBe(201);
      expect(await (await call(store, 'GET', '/db', undefined, admin)).json()).toEqual([{ name: 'metrics' }]);

      expect((await call(store, 'POST', '/db/metrics/keys', { permission: 'write' })).status).toBe(401);
      expect((await call(store, 'POST', '/db/metrics/keys', { permission: 'write' }, admin)).status).toBe(201);

      expect((await call(store, 'DELETE', '/db/metrics', undefined, admin)).status).toBe(204);
      expect(await (await call(store, 'GET', '/db', undefined, admin)).json()).toEqual([]);
    });
  });

  describe('continuous queries', () => {
    it('registers through a select and can be listed and dropped', async () => {
      const store = await withCpuIdle();
      const text = 'select count(*) from cpu.idle where time<forever group_by time(1h) into cpu.idle.hourly';
      const registered = await call(store, 'GET', seriesPath('site_dev', text));
      expect(await registered.json()).toEqual([]);

      const hourly = await call(store, 'GET', seriesPath('site_dev', 'select count from cpu.idle.hourly where time>now()-1d'));
      expect(await hourly.json()).toEqual([{ series: 'cpu.idle.hourly', columns: ['count', 'time'], datapoints: [[5, 1311832800]] }]);

      const listed = await call(store, 'GET', '/db/site_dev/continuous_queries');
      expect(await listed.json()).toEqual([{ id: 1, query: text }]);

      expect((await call(store, 'DELETE', '/db/site_dev/continuous_queries/abc')).status).toBe(400);
      expect((await call(store, 'DELETE', '/db/site_dev/continuous_queries/7')).status).toBe(404);
      expect((await call(store, 'DELETE', '/db/site_dev/continuous_queries/1')).status).toBe(204);
      expect(await (await call(store, 'GET', '/db/site_dev/continuous_queries')).json()).toEqual([]);
    });
  });

  describe('event streams', () => {
    async function readFrame(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<string> {
      const decoder = new TextDecoder();
      let text = '';
      while (!text.endsWith('\n\n')) {
        const { value, done } = await reader.read();
        if (done) break;
        text += decoder.decode(value, { stream: true });
      }
      return text;
    }

    it('streams the initial result and then each write', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'GET', seriesPath('site_dev', 'select value from cpu.idle where time<forever limit 2'), undefined, {
        Accept: 'text/event-stream',
      });
      expect(res.headers.get('content-type')).toBe('text/event-stream');
      const reader = res.body?.getReader();
      if (!reader) throw new Error('expected a response body');

      expect(await readFrame(reader)).toBe(
        'data: [{"series":"cpu.idle","columns":["value","time"],"datapoints":[[6,1311836012],[5,1311836011]]}]\n\n'
      );

      await call(store, 'POST', '/db/site_dev/points', [{ series: 'cpu.idle', points: [[1311836013, 7]] }]);
      expect(await readFrame(reader)).toBe(
        'data: [{"series":"cpu.idle","columns":["value","time"],"datapoints":[[7,1311836013]]}]\n\n'
      );
      await reader.cancel();
    });

    it('answers once without the event-stream accept header', async () => {
      const store = await withCpuIdle();
      const res = await call(store, 'GET', seriesPath('site_dev', 'select value from cpu.idle where time<forever limit 1'));
      expect(await res.json()).toEqual([{ series: 'cpu.idle', columns: ['value', 'time'], datapoints: [[6, 1311836012]] }]);
    });
  });
});
