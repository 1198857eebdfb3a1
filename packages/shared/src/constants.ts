/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Directory (under the configured mirror path) holding the bare clone
 */
export const REPOSITORY_DIR = 'repo.git';

/**
 * Directory (under the configured mirror path) holding one materialized tree per revision
 */
export const SNAPSHOTS_DIR = 'snapshots';

/**
 * Prefix of snapshot directories that are still being written
 */
export const TEMP_SNAPSHOT_PREFIX = '.tmp-';

/**
 * The current snapshot and the one before it must both survive pruning,
 * requests that captured the previous snapshot may still be reading it.
 */
export const MIN_RETAINED_SNAPSHOTS = 2;

export const DEFAULT_MIRROR_PATH = './index-mirror';
export const DEFAULT_UPDATE_INTERVAL_SECONDS = 3600;
/** Longest interval a single Node.js timer can wait (2^31 - 1 ms) */
export const MAX_UPDATE_INTERVAL_SECONDS = 2_147_483;
export const DEFAULT_WEB_ADDRESS = '0.0.0.0';
export const DEFAULT_WEB_PORT = 8080;
export const DEFAULT_CACHE_MAX_AGE_SECONDS = 60;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;
