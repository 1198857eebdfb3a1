/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { MiddlewareHandler } from 'hono';
import { nanoid } from 'nanoid';
import type { AppEnv } from '../factory';
import type { Logger } from '../utils/logger';

/**
 * Request ID middleware
 *
 * Generates a unique request ID for each request and a logger bound to it,
 * so every log entry of one request can be correlated.
 */
export function requestIdMiddleware(baseLogger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = nanoid(16);
    const logger = baseLogger.withRequestId(requestId);

    c.set('requestId', requestId);
    c.set('logger', logger);

    logger.debug('Request started', {
      method: c.req.method,
      path: c.req.path,
    });

    await next();

    // Response is available after next() completes
    c.res.headers.set('X-Request-ID', requestId);
    logger.debug('Request finished', { status: c.res.status });
  };
}
