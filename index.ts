// tickstore: in-memory time-series database with an HTTP API

// Core builder
export { TickStore, BuiltTickStore } from './src/core/TickStore.ts';

// Engine (for embedding without HTTP)
export { Engine } from './src/core/Engine.ts';
export type { EngineOptions, RequestContext } from './src/core/Engine.ts';
export { Database, requiredPermission } from './src/core/Database.ts';
export type { Subscription, WriteListener } from './src/core/Database.ts';
export { ContinuousQuery } from './src/core/ContinuousQuery.ts';
export type { WriteEvent } from './src/core/IncrementalQuery.ts';

// Adapters
export { createApp } from './src/adapters/http.ts';
export { serveNode } from './src/adapters/node.ts';
export type { NodeServerOptions, RunningServer } from './src/adapters/node.ts';

// Configuration, errors, logging
export { loadConfig, resolveConfig, configFromEnv, serverConfigSchema } from './src/core/config.ts';
export type { ServerConfig, ConfigInput } from './src/core/config.ts';
export {
  TickstoreError,
  BadRequestError,
  QuerySyntaxError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  ConflictError,
} from './src/core/errors.ts';
export { Logger } from './src/util/logger.ts';
export type { LogLevel } from './src/util/logger.ts';

// Types
export type { Value, Point, WriteBatch, SeriesResult, TimePrecision, Permission, AccessKey } from './src/types/series.ts';
export type { Statement, SelectQuery, DeleteQuery, ListSeriesQuery, Expr, Condition } from './src/types/query.ts';

// Query language (for advanced use)
export { parseQuery, parseSelect } from './src/query/parseQuery.ts';
export { executeSelect, compileSelect, runSelect, toSeriesResult } from './src/query/QueryExecutor.ts';
export { parseWriteBody } from './src/transform/parsePoints.ts';

// Snapshots (for advanced use)
export { encodeSnapshot, decodeSnapshot } from './src/codec/snapshotCodec.ts';
export type { DatabaseSnapshot } from './src/codec/snapshotCodec.ts';
export { snappyCompress, snappyUncompress } from './src/compress/snappy.ts';
