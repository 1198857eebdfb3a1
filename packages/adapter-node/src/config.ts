/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { ConfigError } from '@index-mirror/core';
import { mirrorConfigSchema, type MirrorConfig } from '@index-mirror/shared';

type Env = Record<string, string | undefined>;

// Unset and blank variables both fall back to the schema default
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the mirror configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadConfig(env: Env): MirrorConfig {
  const result = mirrorConfigSchema.safeParse({
    repo: {
      git_url: read(env, 'MIRROR_GIT_URL'),
      path: read(env, 'MIRROR_PATH'),
      branch: read(env, 'MIRROR_BRANCH'),
      update_interval: read(env, 'MIRROR_UPDATE_INTERVAL'),
      retain_snapshots: read(env, 'MIRROR_RETAIN_SNAPSHOTS'),
    },
    web: {
      address: read(env, 'WEB_ADDRESS'),
      port: read(env, 'WEB_PORT'),
      list_directories: read(env, 'WEB_LIST_DIRECTORIES'),
      cache_max_age: read(env, 'WEB_CACHE_MAX_AGE'),
    },
    log_level: read(env, 'LOG_LEVEL'),
    shutdown_timeout_ms: read(env, 'SHUTDOWN_TIMEOUT_MS'),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, {
      details: { issues },
    });
  }
  return result.data;
}
