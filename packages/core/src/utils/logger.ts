/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Structured logger
 *
 * Emits one JSON object per line so mirror and request events can be filtered
 * by level, request ID or revision in any log collector.
 */

import type { LogLevel } from '@index-mirror/shared';

export type { LogLevel };

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  requestId?: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
    code?: string;
    cause?: string;
  };
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LevelHolder {
  level: LogLevel;
}

export class Logger {
  private readonly levelHolder: LevelHolder;
  private readonly requestId?: string;

  constructor(logLevel: LogLevel = 'info', requestId?: string, levelHolder?: LevelHolder) {
    this.levelHolder = levelHolder ?? { level: logLevel };
    this.requestId = requestId;
  }

  /**
   * Logger that stamps every entry with the given request ID.
   * Shares the level with its parent, so setLevel on either affects both.
   */
  withRequestId(requestId: string): Logger {
    return new Logger(this.levelHolder.level, requestId, this.levelHolder);
  }

  getRequestId(): string | undefined {
    return this.requestId;
  }

  setLevel(level: LogLevel): void {
    this.levelHolder.level = level;
  }

  getLevel(): LogLevel {
    return this.levelHolder.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.levelHolder.level);
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (this.requestId) {
      entry.requestId = this.requestId;
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    if (error) {
      const serialized: NonNullable<LogEntry['error']> = {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
      if ('code' in error && typeof error.code === 'string') {
        serialized.code = error.code;
      }
      if (error.cause instanceof Error) {
        serialized.cause = error.cause.message;
      }
      entry.error = serialized;
    }

    return entry;
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const jsonString = JSON.stringify(this.createLogEntry(level, message, context, error));

    switch (level) {
      case 'debug':
      case 'info':
        console.log(jsonString);
        break;
      case 'warn':
        console.warn(jsonString);
        break;
      case 'error':
        console.error(jsonString);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.emit('warn', message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.emit('error', message, context, error);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get the process-wide logger, creating it on first use.
 * Passing a level reconfigures the existing instance.
 */
export function getLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel);
  }
  if (logLevel) {
    loggerInstance.setLevel(logLevel);
  }
  return loggerInstance;
}

/**
 * Create a standalone logger instance (useful for testing)
 */
export function createLogger(logLevel: LogLevel = 'info'): Logger {
  return new Logger(logLevel);
}
