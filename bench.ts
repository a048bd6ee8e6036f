import { bench, group, run } from 'mitata';
import { encodeVarint } from './src/util/varint.ts';
import { encodeSnapshot, encodeSnapshotBody } from './src/codec/snapshotCodec.ts';
import { snappyCompress } from './src/compress/snappy.ts';
import { parseWriteBody } from './src/transform/parsePoints.ts';
import { parseQuery } from './src/query/parseQuery.ts';
import { Database } from './src/core/Database.ts';
import { Logger } from './src/util/logger.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

const NOW = 1_700_000_000_000;
const logger = new Logger({ level: 'silent' });

function makeBody(seriesCount: number, pointsPerSeries: number): unknown[] {
  return Array.from({ length: seriesCount }, (_, si) => ({
    series: `cpu.host-${si}`,
    extra_columns: ['value', 'region'],
    points: Array.from({ length: pointsPerSeries }, (_, pi) => [
      NOW / 1000 - pointsPerSeries + pi,
      Math.random() * 100,
      pi % 2 === 0 ? 'us-east' : 'eu-west',
    ]),
  }));
}

const smallBody = makeBody(1, 10);
const medBody = makeBody(10, 100);      // 1k points
const largeBody = makeBody(50, 200);    // 10k points

function makeDatabase(body: unknown[]): Database {
  const db = new Database('bench', { logger, clock: () => NOW });
  db.write(parseWriteBody(body, 's', NOW));
  return db;
}

const medDb = makeDatabase(medBody);
const largeDb = makeDatabase(largeBody);
const medSnapshot = medDb.toSnapshot();
const largeSnapshot = largeDb.toSnapshot();
const largeSnapshotBody = encodeSnapshotBody(largeSnapshot);

const rawQuery = parseQuery('select value from cpu.host-0 where time > now() - 1h');
const patternQuery = parseQuery('select mean(value) from cpu.* group by time(1m) where time > now() - 1h');
const dimsQuery = parseQuery('select count(value), percentile(90, value) from cpu.* group by region');

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('varint', () => {
  bench('encode 1', () => encodeVarint(1));
  bench('encode 128', () => encodeVarint(128));
  bench('encode 2^32', () => encodeVarint(4294967296));
  bench('encode ms timestamp', () => encodeVarint(NOW));
});

group('ingest', () => {
  bench('parse 10 points', () => parseWriteBody(smallBody, 's', NOW));
  bench('parse 1k points', () => parseWriteBody(medBody, 's', NOW));
  bench('parse + write 1k points', () => makeDatabase(medBody));
  bench('parse + write 10k points', () => makeDatabase(largeBody));
});

group('query', () => {
  bench('parse select', () => parseQuery('select mean(value) from cpu.* group by time(1m), region limit 10'));
  bench('raw: 1 series', () => largeDb.execute(rawQuery));
  bench('mean by minute: 50 series', () => largeDb.execute(patternQuery));
  bench('count + p90 by region: 50 series', () => largeDb.execute(dimsQuery));
});

group('snapshot encode', () => {
  bench('1k points', () => encodeSnapshotBody(medSnapshot));
  bench('10k points', () => encodeSnapshotBody(largeSnapshot));
  bench('10k points + snappy + header', () => encodeSnapshot(largeSnapshot));
});

group('snappy compress', () => {
  bench(`snapshot ~${largeSnapshotBody.length}B (10k points)`, () => snappyCompress(largeSnapshotBody));
});

await run({ format: 'mitata', colors: true });
