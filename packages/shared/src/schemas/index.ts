// Zod schemas for validation

import { z } from 'zod';
import {
  DEFAULT_CACHE_MAX_AGE_SECONDS,
  DEFAULT_MIRROR_PATH,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  DEFAULT_WEB_ADDRESS,
  DEFAULT_WEB_PORT,
  MAX_UPDATE_INTERVAL_SECONDS,
  MIN_RETAINED_SNAPSHOTS,
} from '../constants';
import type { MirrorConfig } from '../types';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Environment values arrive as strings
const booleanishSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

export const repoConfigSchema = z.object({
  git_url: z.string().min(1, 'Repository git URL is required'),
  path: z.string().min(1).default(DEFAULT_MIRROR_PATH),
  branch: z.string().min(1).optional(),
  update_interval: z.coerce
    .number()
    .int()
    .positive('Update interval must be a positive number of seconds')
    .max(MAX_UPDATE_INTERVAL_SECONDS, `Update interval must not exceed ${MAX_UPDATE_INTERVAL_SECONDS} seconds`)
    .default(DEFAULT_UPDATE_INTERVAL_SECONDS),
  retain_snapshots: z.coerce
    .number()
    .int()
    .min(MIN_RETAINED_SNAPSHOTS, `At least ${MIN_RETAINED_SNAPSHOTS} snapshots must be retained`)
    .default(MIN_RETAINED_SNAPSHOTS),
});

export const webConfigSchema = z.object({
  address: z.string().min(1).default(DEFAULT_WEB_ADDRESS),
  port: z.coerce.number().int().min(1).max(65535, 'Port must be between 1 and 65535').default(DEFAULT_WEB_PORT),
  list_directories: booleanishSchema.default(true),
  cache_max_age: z.coerce.number().int().min(0).default(DEFAULT_CACHE_MAX_AGE_SECONDS),
});

export const mirrorConfigSchema = z.object({
  repo: repoConfigSchema,
  web: webConfigSchema.default({}),
  log_level: logLevelSchema.default('info'),
  shutdown_timeout_ms: z.coerce.number().int().positive().default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
}) satisfies z.ZodType<MirrorConfig, z.ZodTypeDef, unknown>;
