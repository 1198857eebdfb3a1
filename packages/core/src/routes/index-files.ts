/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context } from 'hono';
import type { AppEnv } from '../factory';
import type { IndexFileServer } from '../serving/index-file-server';

/**
 * Path of the request target as the client sent it.
 *
 * URL parsing collapses `..` segments, so under @hono/node-server the raw
 * target is taken from the IncomingMessage and validated by the file server.
 */
export function rawRequestPath(c: Context<AppEnv>): string {
  const target = c.env?.incoming?.url;
  if (target && target.startsWith('/')) {
    const end = target.search(/[?#]/);
    return end === -1 ? target : target.slice(0, end);
  }
  return new URL(c.req.url).pathname;
}

/**
 * GET /* - file from the mirror's current snapshot
 */
export function indexFileRoute(server: IndexFileServer) {
  return async (c: Context<AppEnv>): Promise<Response> => {
    const result = await server.handle(
      {
        requestedPath: rawRequestPath(c),
        ifNoneMatch: c.req.header('If-None-Match'),
      },
      c.get('logger')
    );

    // HEAD is dispatched to this GET handler; release the open file
    if (c.req.method === 'HEAD' && result.body instanceof ReadableStream) {
      await result.body.cancel();
      return new Response(null, { status: result.status, headers: result.headers });
    }

    return new Response(result.body, {
      status: result.status,
      headers: result.headers,
    });
  };
}
