/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Serves files from the mirror's current snapshot

import fs, { type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_CACHE_MAX_AGE_SECONDS } from '@index-mirror/shared';
import {
  MirrorError,
  NotFoundError,
  ReadError,
  RequestPathError,
  httpStatusFor,
  systemErrorCode,
  toError,
  type ErrorStatus,
} from '../errors';
import type { MirrorState } from '../mirror/types';
import { getLogger, type Logger } from '../utils/logger';
import { renderDirectoryListing } from './listing';
import { isWithinRoot, parseRequestPath, resolveWithinRoot } from './request-path';

export interface IndexRequest {
  /** Raw, still percent-encoded path of the request target */
  requestedPath: string;
  ifNoneMatch?: string;
}

export type IndexResponseStatus = 200 | 304 | ErrorStatus;

export interface IndexResponse {
  status: IndexResponseStatus;
  body: ReadableStream<Uint8Array> | string | null;
  headers: Record<string, string>;
}

/**
 * Anything that can hand out the current snapshot (the RepositoryMirror)
 */
export interface SnapshotSource {
  currentState(): MirrorState;
}

export interface IndexFileServerOptions {
  /** Render an HTML listing for directory requests instead of 404 */
  listDirectories?: boolean;
  /** Cache-Control max-age, in seconds */
  cacheMaxAge?: number;
  logger?: Logger;
}

const STREAM_CHUNK_SIZE = 64 * 1024;

const CONTENT_TYPES: Record<string, string> = {
  '.json': 'application/json',
  '.txt': 'text/plain; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.html': 'text/html; charset=utf-8',
};

const STATUS_TEXT: Record<ErrorStatus, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
};

/**
 * Extensionless files are index entries (newline-delimited JSON)
 */
export function contentTypeFor(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  if (!extension) {
    return 'text/plain; charset=utf-8';
  }
  return CONTENT_TYPES[extension] ?? 'application/octet-stream';
}

/**
 * Whether an If-None-Match header value matches `etag` (weak comparison)
 */
export function matchesEtag(ifNoneMatch: string | undefined, etag: string): boolean {
  if (!ifNoneMatch) {
    return false;
  }
  return ifNoneMatch
    .split(',')
    .map((candidate) => candidate.trim().replace(/^W\//, ''))
    .some((candidate) => candidate === '*' || candidate === etag);
}

/**
 * Stream `size` bytes from an open file, closing it once drained or cancelled
 */
function streamFile(handle: FileHandle, size: number): ReadableStream<Uint8Array> {
  let position = 0;
  let closed = false;
  const close = async (): Promise<void> => {
    if (!closed) {
      closed = true;
      await handle.close();
    }
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        if (position >= size) {
          await close();
          controller.close();
          return;
        }
        const chunk = new Uint8Array(Math.min(STREAM_CHUNK_SIZE, size - position));
        const { bytesRead } = await handle.read(chunk, 0, chunk.byteLength, position);
        if (bytesRead === 0) {
          throw new ReadError(`File shrank while streaming (${position} of ${size} bytes read)`);
        }
        position += bytesRead;
        controller.enqueue(bytesRead === chunk.byteLength ? chunk : chunk.subarray(0, bytesRead));
      } catch (error) {
        await close();
        controller.error(error);
      }
    },
    async cancel() {
      await close();
    },
  });
}

/**
 * Translates request paths into reads against one snapshot of the mirror.
 *
 * The snapshot is captured once per request; a refresh that swaps the current
 * state mid-request does not affect the bytes of that response. Never writes.
 */
export class IndexFileServer {
  private readonly source: SnapshotSource;
  private readonly listDirectories: boolean;
  private readonly cacheMaxAge: number;
  private readonly logger: Logger;

  constructor(source: SnapshotSource, options: IndexFileServerOptions = {}) {
    this.source = source;
    this.listDirectories = options.listDirectories ?? true;
    this.cacheMaxAge = options.cacheMaxAge ?? DEFAULT_CACHE_MAX_AGE_SECONDS;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Answer one request from the current snapshot. Never rejects: path, lookup
   * and read failures become 400/404/500 responses with a JSON body.
   *
   * @param logger request-scoped logger (the route passes the one carrying the
   *   request ID); defaults to the server's logger
   */
  async handle(request: IndexRequest, logger: Logger = this.logger): Promise<IndexResponse> {
    try {
      const segments = parseRequestPath(request.requestedPath);
      const snapshot = this.source.currentState();
      return await this.serve(snapshot, segments, request);
    } catch (error) {
      return this.failure(error, request, logger);
    }
  }

  private async serve(
    snapshot: MirrorState,
    segments: string[],
    request: IndexRequest
  ): Promise<IndexResponse> {
    const filePath = resolveWithinRoot(snapshot.rootPath, segments);
    const displayPath = `/${segments.join('/')}`;
    const cacheHeaders = {
      ETag: `"${snapshot.revision}"`,
      'Cache-Control': `public, max-age=${this.cacheMaxAge}`,
    };

    let realPath: string;
    let handle: FileHandle;
    try {
      // Trees may carry symbolic links; only those resolving inside the snapshot are served
      const [realRoot, resolved] = await Promise.all([fs.realpath(snapshot.rootPath), fs.realpath(filePath)]);
      if (!isWithinRoot(realRoot, resolved)) {
        throw new NotFoundError(`File not found: ${displayPath}`, {
          details: { reason: 'symbolic link leaves the snapshot' },
        });
      }
      realPath = resolved;
      handle = await fs.open(realPath, fs.constants.O_RDONLY | fs.constants.O_NOFOLLOW);
    } catch (error) {
      if (error instanceof MirrorError) {
        throw error;
      }
      const code = systemErrorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new NotFoundError(`File not found: ${displayPath}`, { cause: error });
      }
      throw new ReadError(`Failed to open ${displayPath}`, {
        cause: error,
        details: { code, revision: snapshot.revision },
      });
    }

    let streaming = false;
    try {
      const stats = await handle.stat();

      if (stats.isDirectory()) {
        if (!this.listDirectories) {
          throw new NotFoundError(`File not found: ${displayPath}`);
        }
        if (matchesEtag(request.ifNoneMatch, cacheHeaders.ETag)) {
          return { status: 304, body: null, headers: cacheHeaders };
        }
        const entries = await fs.readdir(realPath, { withFileTypes: true });
        const html = renderDirectoryListing(
          segments,
          entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
        );
        return {
          status: 200,
          body: html,
          headers: {
            'Content-Type': 'text/html; charset=utf-8',
            'Content-Length': String(Buffer.byteLength(html)),
            ...cacheHeaders,
          },
        };
      }

      if (!stats.isFile()) {
        throw new NotFoundError(`File not found: ${displayPath}`);
      }

      if (matchesEtag(request.ifNoneMatch, cacheHeaders.ETag)) {
        return { status: 304, body: null, headers: cacheHeaders };
      }

      streaming = true;
      return {
        status: 200,
        body: streamFile(handle, stats.size),
        headers: {
          'Content-Type': contentTypeFor(filePath),
          'Content-Length': String(stats.size),
          ...cacheHeaders,
        },
      };
    } catch (error) {
      if (error instanceof MirrorError) {
        throw error;
      }
      throw new ReadError(`Failed to read ${displayPath}`, {
        cause: error,
        details: { code: systemErrorCode(error), revision: snapshot.revision },
      });
    } finally {
      if (!streaming) {
        await handle.close();
      }
    }
  }

  private failure(error: unknown, request: IndexRequest, logger: Logger): IndexResponse {
    const status = httpStatusFor(error);
    const context = { path: request.requestedPath };

    let message: string;
    if (error instanceof RequestPathError || error instanceof NotFoundError) {
      logger.debug('Index request rejected', { ...context, status, reason: error.message });
      message = error.message;
    } else {
      const readError =
        error instanceof ReadError
          ? error
          : new ReadError('Failed to serve index file', { cause: toError(error) });
      logger.error('Failed to read index file', { ...context, ...readError.details }, readError);
      message = 'An unexpected error occurred';
    }

    const body = JSON.stringify({ error: STATUS_TEXT[status], message });
    return {
      status,
      body,
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(body)),
      },
    };
  }
}
