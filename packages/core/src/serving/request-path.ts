// Request path validation

import path from 'node:path';
import { RequestPathError } from '../errors';

/**
 * Decode a raw request path and split it into segments that are safe to join
 * onto a snapshot root. Empty segments (`//`, trailing `/`) are dropped.
 *
 * @throws RequestPathError for malformed encoding, dot segments, NUL bytes or backslashes
 */
export function parseRequestPath(rawPath: string): string[] {
  if (!rawPath.startsWith('/')) {
    throw new RequestPathError('Request path must start with "/"', { details: { rawPath } });
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch (error) {
    throw new RequestPathError('Malformed percent-encoding in request path', {
      cause: error,
      details: { rawPath },
    });
  }

  if (decoded.includes('\0') || decoded.includes('\\')) {
    throw new RequestPathError('Request path contains forbidden characters', { details: { rawPath } });
  }

  const segments = decoded.split('/').filter((segment) => segment.length > 0);
  for (const segment of segments) {
    if (segment === '.' || segment === '..') {
      throw new RequestPathError('Path traversal is not allowed', { details: { rawPath } });
    }
  }
  return segments;
}

/**
 * Absolute path of `segments` under `root`, refusing anything that resolves outside it
 */
export function resolveWithinRoot(root: string, segments: string[]): string {
  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, ...segments);
  if (!isWithinRoot(resolvedRoot, target)) {
    throw new RequestPathError('Request path escapes the mirror root', {
      details: { segments },
    });
  }
  return target;
}

/**
 * Whether absolute `target` is `root` itself or lies below it
 */
export function isWithinRoot(root: string, target: string): boolean {
  return target === root || target.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}
