/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { toError, type Logger } from '@index-mirror/core';

export interface Stoppable {
  stop(): Promise<void>;
}

export interface ClosableServer {
  close(callback?: (err?: Error) => void): unknown;
}

export interface ShutdownOptions {
  scheduler: Stoppable;
  server: ClosableServer;
  logger: Logger;
  timeoutMs: number;
}

function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Returns the graceful shutdown routine: stop scheduling refreshes, let the
 * running one finish, stop accepting connections and drain in-flight requests.
 * Resolves to the process exit code; repeated calls share the first run.
 */
export function createShutdown(options: ShutdownOptions): (signal: string) => Promise<number> {
  const { scheduler, server, logger, timeoutMs } = options;
  let pending: Promise<number> | null = null;

  const run = async (signal: string): Promise<number> => {
    logger.info('Received termination signal, shutting down', { signal, timeoutMs });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<number>((resolve) => {
      timer = setTimeout(() => {
        logger.error('Graceful shutdown timed out', { timeoutMs });
        resolve(1);
      }, timeoutMs);
    });

    const graceful = (async (): Promise<number> => {
      try {
        await Promise.all([scheduler.stop(), closeServer(server)]);
        logger.info('Shutdown complete');
        return 0;
      } catch (error) {
        logger.error('Error during shutdown', {}, toError(error));
        return 1;
      }
    })();

    try {
      return await Promise.race([graceful, timeout]);
    } finally {
      clearTimeout(timer);
    }
  };

  return (signal: string) => {
    if (!pending) {
      pending = run(signal);
    }
    return pending;
  };
}
