/**
 * Server configuration from the environment (and a `.env` file when present).
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { BadRequestError } from './errors.ts';

export const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65_535).default(8086),
  host: z.string().min(1).default('0.0.0.0'),
  dataDir: z.string().min(1).optional(),
  flushIntervalMs: z.coerce.number().int().min(0).default(10_000),
  adminKey: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

/** Raw values keyed like ServerConfig; undefined entries fall back to defaults. */
export type ConfigInput = { [K in keyof ServerConfig]?: string | number | undefined };

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  return {
    port: env.TICKSTORE_PORT,
    host: env.TICKSTORE_HOST,
    dataDir: env.TICKSTORE_DATA_DIR,
    flushIntervalMs: env.TICKSTORE_FLUSH_INTERVAL_MS,
    adminKey: env.TICKSTORE_ADMIN_KEY,
    logLevel: env.LOG_LEVEL,
  };
}

/** Validate merged config input; later sources win, blank values are skipped. */
export function resolveConfig(...sources: ConfigInput[]): ServerConfig {
  const merged: ConfigInput = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value !== '') Object.assign(merged, { [key]: value });
    }
  }
  const result = serverConfigSchema.safeParse(merged);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new BadRequestError(`Invalid configuration: ${messages.join('; ')}`);
  }
  return result.data;
}

/** Load `.env`, then resolve environment overlaid with explicit overrides. */
export function loadConfig(overrides: ConfigInput = {}): ServerConfig {
  loadDotenv();
  return resolveConfig(configFromEnv(), overrides);
}
