import type { IncomingMessage } from 'node:http';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestIdMiddleware } from './middleware/request-id';
import { indexFileRoute } from './routes/index-files';
import type { IndexFileServer } from './serving/index-file-server';
import { getLogger, type Logger } from './utils/logger';

// Bindings provided by @hono/node-server; absent under app.request() in tests
export interface AppBindings {
  incoming?: IncomingMessage;
}

export interface AppVariables {
  requestId?: string;
  logger: Logger;
}

export type AppEnv = { Bindings: AppBindings; Variables: AppVariables };

export type AppInstance = Hono<AppEnv>;

/**
 * Create the Hono application serving the mirror.
 * Only GET (and HEAD, answered by the GET handler) reach the index files.
 */
export function createApp(options: { server: IndexFileServer; logger?: Logger }): AppInstance {
  const app = new Hono<AppEnv>();
  const logger = options.logger ?? getLogger();

  // Global middleware
  app.use('*', cors({ origin: '*', allowMethods: ['GET', 'HEAD', 'OPTIONS'] }));
  app.use('*', requestIdMiddleware(logger));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error(
      'Unhandled error',
      {
        method: c.req.method,
        path: c.req.path,
        ...(requestId ? { requestId } : {}),
      },
      err
    );
    return c.json(
      {
        error: 'Internal Server Error',
        message: 'An unexpected error occurred',
        ...(requestId ? { requestId } : {}),
      },
      500
    );
  });

  app.get('*', indexFileRoute(options.server));

  app.all('*', (c) =>
    c.json({ error: 'Method Not Allowed', message: `${c.req.method} is not supported` }, 405, {
      Allow: 'GET, HEAD',
    })
  );

  return app;
}
