/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Error codes used by the mirror.
 * Sync-path errors never reach HTTP clients; request-path errors map to a status code.
 */
export type MirrorErrorCode =
  // Startup
  | 'ConfigError'
  | 'AcquisitionError'
  // Sync path
  | 'RefreshError'
  | 'VcsCommandError'
  | 'MirrorNotInitializedError'
  // Request path
  | 'RequestPathError'
  | 'NotFoundError'
  | 'ReadError';

export interface MirrorErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional structured details, included in logs */
  details?: Record<string, unknown>;
}

/**
 * Base class for all mirror errors.
 *
 * @example
 * ```typescript
 * throw new AcquisitionError('Failed to clone upstream repository', {
 *   cause: originalError,
 *   details: { gitUrl },
 * });
 * ```
 */
export class MirrorError extends Error {
  public readonly code: MirrorErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: MirrorErrorCode, message: string, options: MirrorErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Invalid or missing configuration. Exits the process with code 2.
 */
export class ConfigError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * The initial local copy could not be established. Fatal at startup.
 */
export class AcquisitionError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('AcquisitionError', message, options);
  }
}

/**
 * A refresh failed. Recorded on the mirror state and retried on the next tick.
 */
export class RefreshError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('RefreshError', message, options);
  }
}

/**
 * A git process exited non-zero or could not be started.
 */
export class VcsCommandError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('VcsCommandError', message, options);
  }
}

export class MirrorNotInitializedError extends MirrorError {
  constructor(message = 'Mirror has not been initialized, call ensureInitialized() first') {
    super('MirrorNotInitializedError', message);
  }
}

/**
 * Malformed or escaping request path (400).
 */
export class RequestPathError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('RequestPathError', message, options);
  }
}

/**
 * Requested file is not part of the snapshot (404).
 */
export class NotFoundError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('NotFoundError', message, options);
  }
}

/**
 * File exists but could not be read (500).
 */
export class ReadError extends MirrorError {
  constructor(message: string, options: MirrorErrorOptions = {}) {
    super('ReadError', message, options);
  }
}

export type ErrorStatus = 400 | 404 | 500;

/**
 * HTTP status a request-path error is reported with
 */
export function httpStatusFor(error: unknown): ErrorStatus {
  if (error instanceof RequestPathError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  return 500;
}

/**
 * errno code of a Node.js system error, if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
