/**
 * Converts a `POST /db/{db}/points` body to WriteBatch[].
 *
 * Accepts, per series batch:
 *  - array rows `[time, ...values]` named by `extra_columns` (default `["value"]`)
 *  - object rows `{ column: value, time? }`
 *
 * A null or missing time means "now". Times are converted from the request
 * precision to milliseconds.
 */

import { z } from 'zod';
import type { TimePrecision, Value, WriteBatch, IncomingPoint } from '../types/series.ts';
import { BadRequestError } from '../core/errors.ts';
import { PRECISION_MS } from '../query/timeRange.ts';

/** Series names must read back as exact names in a query. */
const SERIES_NAME = /^(?!\/)[^\s,()*+?[\]{}|^$\\]+$/;

const valueSchema = z.union([z.number().finite(), z.string(), z.boolean(), z.null()]);
const timeSchema = z.number().finite().nullable();

const columnName = z
  .string()
  .min(1)
  .refine((c) => c !== 'time', { message: '"time" is reserved' });

const batchSchema = z.object({
  series: z.string().regex(SERIES_NAME, 'Invalid series name'),
  extra_columns: z.array(columnName).optional(),
  points: z.array(
    z.union([
      z.tuple([timeSchema]).rest(valueSchema),
      z.record(z.string(), valueSchema),
    ])
  ),
});

export const writeBodySchema = z.array(batchSchema);

export type WriteBody = z.infer<typeof writeBodySchema>;

export function parseWriteBody(body: unknown, precision: TimePrecision, now: number): WriteBatch[] {
  const parsed = writeBodySchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new BadRequestError(`Invalid points body${path ? ` at ${path}` : ''}: ${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data.map((batch, i) => toWriteBatch(batch, i, precision, now));
}

function toWriteBatch(batch: WriteBody[number], index: number, precision: TimePrecision, now: number): WriteBatch {
  const columns = batch.extra_columns ?? ['value'];
  const toMs = (t: number | null | undefined): number =>
    t === null || t === undefined ? now : Math.round(t * PRECISION_MS[precision]);

  const points: IncomingPoint[] = batch.points.map((row, j) => {
    if (Array.isArray(row)) {
      const [time, ...rest] = row;
      if (rest.length > columns.length) {
        throw new BadRequestError(
          `Point ${index}.${j} of '${batch.series}' has ${rest.length} values for ${columns.length} columns`
        );
      }
      const values: Record<string, Value> = {};
      rest.forEach((v, k) => {
        const column = columns[k];
        if (column !== undefined) values[column] = v;
      });
      return { time: toMs(time), values };
    }

    const { time, ...values } = row;
    if (time !== undefined && time !== null && typeof time !== 'number') {
      throw new BadRequestError(`Point ${index}.${j} of '${batch.series}' has a non-numeric time`);
    }
    return { time: toMs(time), values };
  });

  return { series: batch.series, points };
}
