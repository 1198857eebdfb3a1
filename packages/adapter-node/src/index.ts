/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { serve } from '@hono/node-server';
import {
  ConfigError,
  GitCliClient,
  IndexFileServer,
  RepositoryMirror,
  SyncScheduler,
  createApp,
  getLogger,
  toError,
} from '@index-mirror/core';
import { config } from 'dotenv';
import { loadConfig } from './config.js';
import { createShutdown } from './shutdown.js';

// Load environment variables
config();

async function start(): Promise<void> {
  const settings = loadConfig(process.env);
  const { repo, web } = settings;
  const logger = getLogger(settings.log_level);

  logger.info('Starting index mirror', {
    gitUrl: repo.git_url,
    path: repo.path,
    branch: repo.branch ?? 'HEAD',
    updateInterval: repo.update_interval,
    address: web.address,
    port: web.port,
  });

  const mirror = new RepositoryMirror({
    vcs: new GitCliClient(),
    branch: repo.branch,
    retainSnapshots: repo.retain_snapshots,
    logger,
  });
  // Fatal on failure: there is nothing to serve without an initial copy
  await mirror.ensureInitialized(repo.git_url, repo.path);

  const scheduler = new SyncScheduler(mirror, {
    intervalSeconds: repo.update_interval,
    logger,
  });
  scheduler.start();

  const app = createApp({
    server: new IndexFileServer(mirror, {
      listDirectories: web.list_directories,
      cacheMaxAge: web.cache_max_age,
      logger,
    }),
    logger,
  });

  const server = serve({ fetch: app.fetch, port: web.port, hostname: web.address }, (info) => {
    logger.info('Web server started', { url: `http://${web.address}:${info.port}` });
  });

  const shutdown = createShutdown({
    scheduler,
    server,
    logger,
    timeoutMs: settings.shutdown_timeout_ms,
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then((code) => process.exit(code))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { signal }, toError(error));
          process.exit(1);
        });
    });
  }
}

start().catch((error: unknown) => {
  const err = toError(error);
  getLogger().error('Startup failed', {}, err);
  process.exit(err instanceof ConfigError ? 2 : 1);
});
