import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MirrorNotInitializedError } from '../errors';
import type { MirrorState } from '../mirror/types';
import {
  IndexFileServer,
  contentTypeFor,
  matchesEtag,
  type IndexResponse,
  type SnapshotSource,
} from '../serving/index-file-server';
import { createLogger } from '../utils/logger';

const CONFIG_JSON = '{"dl":"https://static.example.com/api/v1/crates","api":"https://example.com"}\n';

async function bodyBytes(response: IndexResponse): Promise<Uint8Array> {
  return new Uint8Array(await new Response(response.body).arrayBuffer());
}

async function bodyText(response: IndexResponse): Promise<string> {
  return new Response(response.body).text();
}

describe('IndexFileServer', () => {
  let tmpDir: string;
  let root: string;
  let source: SnapshotSource;
  let logger: ReturnType<typeof createLogger>;

  const createServer = (options: { listDirectories?: boolean } = {}) =>
    new IndexFileServer(source, { logger, ...options });

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'index-server-test-'));
    root = path.join(tmpDir, 'snapshots', 'rev-a');
    await fs.mkdir(path.join(root, 'se', 'rd'), { recursive: true });
    await fs.writeFile(path.join(root, 'config.json'), CONFIG_JSON);
    await fs.writeFile(path.join(root, 'se', 'rd', 'serde'), '{"name":"serde","vers":"1.0.0"}\n');
    await fs.writeFile(path.join(tmpDir, 'secret'), 'outside the mirror');

    const state: MirrorState = { rootPath: root, revision: 'rev-a', lastSyncedAt: new Date(0) };
    source = { currentState: () => state };
    logger = createLogger('error');
    vi.spyOn(logger, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('present files', () => {
    it('returns 200 with the exact file contents', async () => {
      const response = await createServer().handle({ requestedPath: '/config.json' });

      expect(response.status).toBe(200);
      expect(await bodyText(response)).toBe(CONFIG_JSON);
      expect(response.headers).toEqual({
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(CONFIG_JSON)),
        ETag: '"rev-a"',
        'Cache-Control': 'public, max-age=60',
      });
    });

    it('serves extensionless index entries as text', async () => {
      const response = await createServer().handle({ requestedPath: '/se/rd/serde' });

      expect(response.status).toBe(200);
      expect(response.headers['Content-Type']).toBe('text/plain; charset=utf-8');
      expect(await bodyText(response)).toBe('{"name":"serde","vers":"1.0.0"}\n');
    });

    it('streams binary content byte-for-byte across chunk boundaries', async () => {
      const bytes = new Uint8Array(150_000);
      for (let i = 0; i < bytes.length; i++) {
        bytes[i] = (i * 31) % 256;
      }
      await fs.writeFile(path.join(root, 'large.bin'), bytes);

      const response = await createServer().handle({ requestedPath: '/large.bin' });

      expect(response.headers['Content-Length']).toBe('150000');
      expect(response.headers['Content-Type']).toBe('application/octet-stream');
      expect(await bodyBytes(response)).toEqual(bytes);
    });

    it('serves empty files', async () => {
      await fs.writeFile(path.join(root, 'empty.json'), '');

      const response = await createServer().handle({ requestedPath: '/empty.json' });

      expect(response.status).toBe(200);
      expect(response.headers['Content-Length']).toBe('0');
      expect(await bodyText(response)).toBe('');
    });

    it('decodes percent-encoded names', async () => {
      const response = await createServer().handle({ requestedPath: '/se/%72d/serde' });

      expect(response.status).toBe(200);
    });
  });

  describe('conditional requests', () => {
    it.each(['"rev-a"', 'W/"rev-a"', '"rev-0", "rev-a"', '*'])(
      'returns 304 for If-None-Match %s',
      async (ifNoneMatch) => {
        const response = await createServer().handle({ requestedPath: '/config.json', ifNoneMatch });

        expect(response.status).toBe(304);
        expect(response.body).toBeNull();
        expect(response.headers.ETag).toBe('"rev-a"');
      }
    );

    it('returns the file when the ETag is stale', async () => {
      const response = await createServer().handle({
        requestedPath: '/config.json',
        ifNoneMatch: '"rev-0"',
      });

      expect(response.status).toBe(200);
      expect(await bodyText(response)).toBe(CONFIG_JSON);
    });
  });

  describe('missing files', () => {
    it('returns 404 for an absent file', async () => {
      const response = await createServer().handle({ requestedPath: '/no/such/crate' });

      expect(response.status).toBe(404);
      expect(JSON.parse(await bodyText(response))).toEqual({
        error: 'Not Found',
        message: 'File not found: /no/such/crate',
      });
    });

    it('returns 404 when a path runs through a file', async () => {
      const response = await createServer().handle({ requestedPath: '/config.json/extra' });

      expect(response.status).toBe(404);
    });

    it('returns 404 for directories when listings are disabled', async () => {
      const response = await createServer({ listDirectories: false }).handle({ requestedPath: '/se' });

      expect(response.status).toBe(404);
    });
  });

  describe('path validation', () => {
    it.each([
      '/../../etc/passwd',
      '/..%2f..%2fetc',
      '/..%2Fsecret',
      '/%2e%2e/secret',
      '/se/../config.json',
      '/./config.json',
      '/config.json%00',
      '/se%5c..%5csecret',
      '/%E0%A4%A',
      'config.json',
    ])('rejects %s with 400', async (requestedPath) => {
      const response = await createServer().handle({ requestedPath });

      expect(response.status).toBe(400);
      expect(JSON.parse(await bodyText(response)).error).toBe('Bad Request');
    });
  });

  describe('symbolic links', () => {
    it('does not follow a link to a file outside the snapshot', async () => {
      await fs.symlink(path.join(tmpDir, 'secret'), path.join(root, 'leak'));

      const response = await createServer().handle({ requestedPath: '/leak' });

      expect(response.status).toBe(404);
      expect(JSON.parse(await bodyText(response))).toEqual({
        error: 'Not Found',
        message: 'File not found: /leak',
      });
    });

    it('does not follow a linked directory outside the snapshot', async () => {
      await fs.symlink(tmpDir, path.join(root, 'outside'));

      const response = await createServer().handle({ requestedPath: '/outside/secret' });

      expect(response.status).toBe(404);
    });

    it('serves links that stay inside the snapshot', async () => {
      await fs.symlink('config.json', path.join(root, 'alias.json'));

      const response = await createServer().handle({ requestedPath: '/alias.json' });

      expect(response.status).toBe(200);
      expect(await bodyText(response)).toBe(CONFIG_JSON);
    });
  });

  describe('directories', () => {
    it('lists the root directory', async () => {
      const response = await createServer().handle({ requestedPath: '/' });
      const html = await bodyText(response);

      expect(response.status).toBe(200);
      expect(response.headers['Content-Type']).toBe('text/html; charset=utf-8');
      expect(html).toContain('<ul><li><a href="/se/">se/</a></li><li><a href="/config.json">config.json</a></li></ul>');
    });

    it('links nested listings back to their parent', async () => {
      const response = await createServer().handle({ requestedPath: '/se/rd/' });
      const html = await bodyText(response);

      expect(html).toContain('<ul><li><a href="/se/">../</a></li><li><a href="/se/rd/serde">serde</a></li></ul>');
    });
  });

  describe('read failures', () => {
    it('returns 500 and logs when the file cannot be read', async () => {
      await fs.symlink('loop', path.join(root, 'loop'));

      const response = await createServer().handle({ requestedPath: '/loop' });

      expect(response.status).toBe(500);
      expect(JSON.parse(await bodyText(response))).toEqual({
        error: 'Internal Server Error',
        message: 'An unexpected error occurred',
      });
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to read index file',
        expect.objectContaining({ path: '/loop', code: 'ELOOP' }),
        expect.objectContaining({ code: 'ReadError' })
      );
    });

    it('logs through the request logger when one is passed', async () => {
      await fs.symlink('loop', path.join(root, 'loop'));
      const requestLogger = logger.withRequestId('req-1');
      vi.spyOn(requestLogger, 'error').mockImplementation(() => {});

      await createServer().handle({ requestedPath: '/loop' }, requestLogger);

      expect(requestLogger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('returns 500 when the mirror has no snapshot yet', async () => {
      source = {
        currentState: () => {
          throw new MirrorNotInitializedError();
        },
      };

      const response = await createServer().handle({ requestedPath: '/config.json' });

      expect(response.status).toBe(500);
    });
  });
});

describe('contentTypeFor', () => {
  it('maps known extensions and treats extensionless files as text', () => {
    expect(contentTypeFor('/x/config.json')).toBe('application/json');
    expect(contentTypeFor('/x/se/rd/serde')).toBe('text/plain; charset=utf-8');
    expect(contentTypeFor('/x/archive.tar')).toBe('application/octet-stream');
  });
});

describe('matchesEtag', () => {
  it('ignores a missing header', () => {
    expect(matchesEtag(undefined, '"rev-a"')).toBe(false);
  });
});
