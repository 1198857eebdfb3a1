// Mirror types

import type { RefreshError } from '../errors';

/**
 * One published snapshot of the mirror. Replaced, never mutated.
 */
export interface MirrorState {
  /** Absolute path of a fully materialized tree */
  readonly rootPath: string;
  /** Commit the tree was checked out from */
  readonly revision: string;
  readonly lastSyncedAt: Date;
  /** Set when the most recent refresh failed; rootPath/revision are then the previous snapshot's */
  readonly lastError?: RefreshError;
}

/**
 * Outcome of one refresh. Failures are reported here, not thrown.
 */
export interface SyncResult {
  success: boolean;
  /** Revision that is current after the refresh */
  revision?: string;
  /** Whether a new snapshot was published */
  changed: boolean;
  error?: string;
}

export interface MirrorLayout {
  localPath: string;
  gitDir: string;
  snapshotsDir: string;
}
