/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// VcsClient backed by the git command-line tool

import { rm } from 'node:fs/promises';
import { execa, ExecaError } from 'execa';
import { VcsCommandError } from '../errors';
import type { VcsClient } from '../ports';

export interface GitCliClientOptions {
  /** git executable, resolved through PATH */
  binary?: string;
  /** Kill a single git invocation after this many milliseconds */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

// `ref: refs/heads/main<TAB>HEAD` in `git ls-remote --symref` output
const DEFAULT_BRANCH_LINE = /^ref: (refs\/heads\/\S+)\tHEAD$/m;

export class GitCliClient implements VcsClient {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: GitCliClientOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async exec(args: string[], env: Record<string, string> = {}): Promise<string> {
    try {
      const result = await execa(this.binary, args, {
        // Never wait on a credential prompt
        env: { GIT_TERMINAL_PROMPT: '0', ...env },
        timeout: this.timeoutMs,
      });
      return result.stdout.trim();
    } catch (error) {
      const stderr =
        error instanceof ExecaError && typeof error.stderr === 'string' ? error.stderr.trim() : '';
      throw new VcsCommandError(
        `Git command failed: git ${args.join(' ')}${stderr ? `\n${stderr}` : ''}`,
        {
          cause: error,
          details: {
            args,
            exitCode: error instanceof ExecaError ? error.exitCode : undefined,
            timedOut: error instanceof ExecaError ? error.timedOut : undefined,
          },
        }
      );
    }
  }

  async clone(url: string, gitDir: string): Promise<void> {
    await this.exec(['clone', '--bare', '--quiet', url, gitDir]);
  }

  async fetch(gitDir: string): Promise<void> {
    await this.exec([
      `--git-dir=${gitDir}`,
      'fetch',
      '--prune',
      '--quiet',
      'origin',
      '+refs/heads/*:refs/heads/*',
    ]);
    await this.followDefaultBranch(gitDir);
  }

  /**
   * A bare clone pins HEAD to the default branch at clone time; repoint it
   * when upstream has switched its default branch since.
   */
  private async followDefaultBranch(gitDir: string): Promise<void> {
    const output = await this.exec([`--git-dir=${gitDir}`, 'ls-remote', '--symref', 'origin', 'HEAD']);
    const match = DEFAULT_BRANCH_LINE.exec(output);
    if (match) {
      await this.exec([`--git-dir=${gitDir}`, 'symbolic-ref', 'HEAD', match[1]]);
    }
  }

  async resolveRevision(gitDir: string, ref: string): Promise<string> {
    return this.exec([`--git-dir=${gitDir}`, 'rev-parse', '--verify', `${ref}^{commit}`]);
  }

  /**
   * Materialize a tree without touching the repository's own index:
   * read-tree into a throwaway index file, then check every entry out with targetDir as work tree.
   */
  async checkout(gitDir: string, revision: string, targetDir: string): Promise<void> {
    const indexFile = `${targetDir}.index`;
    const env = { GIT_INDEX_FILE: indexFile };
    try {
      await this.exec([`--git-dir=${gitDir}`, 'read-tree', revision], env);
      await this.exec(
        [`--git-dir=${gitDir}`, `--work-tree=${targetDir}`, 'checkout-index', '--all', '--force'],
        env
      );
    } finally {
      await rm(indexFile, { force: true });
    }
  }
}
