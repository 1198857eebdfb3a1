/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Local mirror of the upstream index repository

import fs from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import pRetry from 'p-retry';
import {
  MIN_RETAINED_SNAPSHOTS,
  REPOSITORY_DIR,
  SNAPSHOTS_DIR,
  TEMP_SNAPSHOT_PREFIX,
} from '@index-mirror/shared';
import {
  AcquisitionError,
  MirrorNotInitializedError,
  RefreshError,
  toError,
} from '../errors';
import type { VcsClient } from '../ports';
import { getLogger, type Logger } from '../utils/logger';
import type { MirrorLayout, MirrorState, SyncResult } from './types';

export interface RepositoryMirrorOptions {
  vcs: VcsClient;
  /** Branch to track; the upstream default branch (HEAD) when omitted */
  branch?: string;
  /** Snapshot directories kept on disk, including the current one */
  retainSnapshots?: number;
  /** Extra clone attempts before ensureInitialized gives up */
  cloneRetries?: number;
  logger?: Logger;
  now?: () => Date;
}

// Revisions become directory names
const SAFE_REVISION = /^[0-9A-Za-z][0-9A-Za-z_-]*$/;

export function resolveLayout(localPath: string): MirrorLayout {
  const root = path.resolve(localPath);
  return {
    localPath: root,
    gitDir: path.join(root, REPOSITORY_DIR),
    snapshotsDir: path.join(root, SNAPSHOTS_DIR),
  };
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Owns the on-disk copy of the upstream repository.
 *
 * The bare clone is only ever touched here. Every revision is materialized into
 * its own snapshot directory through a temporary sibling and a rename, and the
 * current MirrorState is swapped only after the rename, so a reader holding any
 * state sees a complete tree.
 */
export class RepositoryMirror {
  private readonly vcs: VcsClient;
  private readonly ref: string;
  private readonly retainSnapshots: number;
  private readonly cloneRetries: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private layout: MirrorLayout | null = null;
  private state: MirrorState | null = null;
  private inFlight: Promise<SyncResult> | null = null;
  private initializing: Promise<MirrorState> | null = null;
  // Published snapshot roots, oldest first
  private history: string[] = [];

  constructor(options: RepositoryMirrorOptions) {
    this.vcs = options.vcs;
    this.ref = options.branch ?? 'HEAD';
    this.retainSnapshots = Math.max(
      options.retainSnapshots ?? MIN_RETAINED_SNAPSHOTS,
      MIN_RETAINED_SNAPSHOTS
    );
    this.cloneRetries = options.cloneRetries ?? 2;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Clone the upstream repository unless a clone already exists, then publish
   * a snapshot of the tracked revision. Safe to call on every startup.
   *
   * @throws AcquisitionError when the remote is unreachable or the path is unwritable
   */
  ensureInitialized(gitUrl: string, localPath: string): Promise<MirrorState> {
    if (this.state) {
      return Promise.resolve(this.state);
    }
    if (!this.initializing) {
      this.initializing = this.initialize(gitUrl, localPath).finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async initialize(gitUrl: string, localPath: string): Promise<MirrorState> {
    const layout = resolveLayout(localPath);

    let startupError: RefreshError | undefined;
    try {
      if (await pathExists(layout.gitDir)) {
        this.logger.info('Using existing repository', { gitDir: layout.gitDir });
        startupError = await this.catchUp(layout);
      } else {
        this.logger.info('Cloning repository', { gitUrl, gitDir: layout.gitDir });
        await fs.mkdir(layout.localPath, { recursive: true });
        await pRetry(() => this.cloneFresh(gitUrl, layout.gitDir), {
          retries: this.cloneRetries,
        });
        this.logger.info('Repository cloned', { gitUrl });
      }

      await fs.mkdir(layout.snapshotsDir, { recursive: true });
      await this.removeTemporarySnapshots(layout);

      const revision = await this.resolveTrackedRevision(layout);
      const rootPath = await this.materialize(layout, revision);

      this.layout = layout;
      const state = this.publish({ rootPath, revision, lastSyncedAt: this.now() }, startupError);
      this.logger.info('Mirror initialized', { revision, rootPath });
      await this.pruneSnapshots(layout);
      return state;
    } catch (error) {
      const cause = toError(error);
      throw new AcquisitionError(
        `Failed to establish local copy of ${gitUrl} at ${layout.localPath}: ${cause.message}`,
        { cause, details: { gitUrl, localPath: layout.localPath } }
      );
    }
  }

  /**
   * Fetch upstream changes and publish the new revision as the current snapshot.
   *
   * Never rejects for sync failures: the previous snapshot stays current and the
   * error is recorded in `lastError`. Calls made while a refresh is running share
   * its result.
   */
  refresh(): Promise<SyncResult> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  isInitialized(): boolean {
    return this.state !== null;
  }

  currentState(): MirrorState {
    if (!this.state) {
      throw new MirrorNotInitializedError();
    }
    return this.state;
  }

  currentRoot(): string {
    return this.currentState().rootPath;
  }

  private async runRefresh(): Promise<SyncResult> {
    const layout = this.layout;
    const previous = this.currentState();
    if (!layout) {
      throw new MirrorNotInitializedError();
    }

    try {
      this.logger.debug('Fetching upstream changes', { revision: previous.revision });
      await this.vcs.fetch(layout.gitDir);
      const revision = await this.resolveTrackedRevision(layout);

      if (revision === previous.revision) {
        this.logger.info('Already up-to-date', { revision });
        this.publish({
          rootPath: previous.rootPath,
          revision,
          lastSyncedAt: this.now(),
        });
        return { success: true, revision, changed: false };
      }

      const rootPath = await this.materialize(layout, revision);
      this.publish({ rootPath, revision, lastSyncedAt: this.now() });
      this.logger.info('Snapshot published', {
        revision,
        previousRevision: previous.revision,
        rootPath,
      });

      await this.pruneSnapshots(layout);
      return { success: true, revision, changed: true };
    } catch (error) {
      const cause = toError(error);
      const refreshError = new RefreshError(`Refresh failed: ${cause.message}`, {
        cause,
        details: { revision: previous.revision },
      });
      this.state = Object.freeze({
        rootPath: previous.rootPath,
        revision: previous.revision,
        lastSyncedAt: previous.lastSyncedAt,
        lastError: refreshError,
      });
      this.logger.error('Refresh failed, keeping previous snapshot', { revision: previous.revision }, refreshError);
      return {
        success: false,
        revision: previous.revision,
        changed: false,
        error: refreshError.message,
      };
    }
  }

  /**
   * Fetch into a clone left by a previous run. Failing to reach upstream is not
   * fatal here: the local revision is served and the error is recorded.
   */
  private async catchUp(layout: MirrorLayout): Promise<RefreshError | undefined> {
    try {
      await this.vcs.fetch(layout.gitDir);
      return undefined;
    } catch (error) {
      const cause = toError(error);
      const refreshError = new RefreshError(`Refresh failed: ${cause.message}`, { cause });
      this.logger.warn('Could not fetch upstream changes, serving the local revision', {}, refreshError);
      return refreshError;
    }
  }

  private async cloneFresh(gitUrl: string, gitDir: string): Promise<void> {
    // A failed attempt can leave a partial clone behind
    await fs.rm(gitDir, { recursive: true, force: true });
    await this.vcs.clone(gitUrl, gitDir);
  }

  private async resolveTrackedRevision(layout: MirrorLayout): Promise<string> {
    const revision = await this.vcs.resolveRevision(layout.gitDir, this.ref);
    if (!SAFE_REVISION.test(revision)) {
      throw new Error(`Unexpected revision identifier for ${this.ref}: ${JSON.stringify(revision)}`);
    }
    return revision;
  }

  /**
   * Directory holding the complete tree of `revision`, creating it if needed.
   * Only complete trees ever carry the final name.
   */
  private async materialize(layout: MirrorLayout, revision: string): Promise<string> {
    const finalDir = path.join(layout.snapshotsDir, revision);
    if (await pathExists(finalDir)) {
      return finalDir;
    }

    const tempDir = path.join(layout.snapshotsDir, `${TEMP_SNAPSHOT_PREFIX}${revision}-${nanoid(8)}`);
    await fs.mkdir(tempDir);
    try {
      await this.vcs.checkout(layout.gitDir, revision, tempDir);
      await fs.rename(tempDir, finalDir);
    } catch (error) {
      await fs.rm(tempDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Failed to remove incomplete snapshot', { tempDir }, toError(cleanupError));
      });
      throw error;
    }
    return finalDir;
  }

  private publish(
    next: { rootPath: string; revision: string; lastSyncedAt: Date },
    lastError?: RefreshError
  ): MirrorState {
    const state: MirrorState = Object.freeze(lastError ? { ...next, lastError } : { ...next });
    this.state = state;
    if (this.history[this.history.length - 1] !== state.rootPath) {
      this.history = [...this.history.filter((root) => root !== state.rootPath), state.rootPath];
    }
    return state;
  }

  private async removeTemporarySnapshots(layout: MirrorLayout): Promise<void> {
    const entries = await fs.readdir(layout.snapshotsDir);
    for (const entry of entries) {
      if (entry.startsWith(TEMP_SNAPSHOT_PREFIX)) {
        this.logger.warn('Removing incomplete snapshot left by a previous run', { entry });
        await fs.rm(path.join(layout.snapshotsDir, entry), { recursive: true, force: true });
      }
    }
  }

  /**
   * Delete snapshot directories beyond the newest `retainSnapshots`.
   * Failures are logged; an extra directory on disk never affects serving.
   */
  private async pruneSnapshots(layout: MirrorLayout): Promise<void> {
    this.history = this.history.slice(-this.retainSnapshots);
    const keep = new Set(this.history);

    try {
      const entries = await fs.readdir(layout.snapshotsDir, { withFileTypes: true });
      for (const entry of entries) {
        const entryPath = path.join(layout.snapshotsDir, entry.name);
        if (!entry.isDirectory() || entry.name.startsWith(TEMP_SNAPSHOT_PREFIX) || keep.has(entryPath)) {
          continue;
        }
        await fs.rm(entryPath, { recursive: true, force: true });
        this.logger.debug('Snapshot pruned', { snapshot: entry.name });
      }
    } catch (error) {
      this.logger.warn('Failed to prune old snapshots', { snapshotsDir: layout.snapshotsDir }, toError(error));
    }
  }
}
