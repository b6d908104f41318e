import { Injectable } from '@nestjs/common';
import pino, { type Logger as PinoLogger } from 'pino';
import type { LogLevel, LoggerModuleOptions } from './logger.interface';
import { buildPinoOptions } from './pino-options';

export interface LogContext {
  [key: string]: unknown;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

/**
 * Structured logger over pino.
 *
 * The root instance is provided by LoggerModule; classes call `child()` with
 * their own name, and request handlers use `withCorrelationId()` so every line
 * of one request can be grouped.
 */
@Injectable()
export class LoggerService {
  private readonly pino: PinoLogger;

  constructor(
    options: LoggerModuleOptions = {},
    private readonly bindings: LogContext = {},
    parent?: PinoLogger,
  ) {
    this.pino = parent ?? pino(buildPinoOptions(options));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, {
      ...context,
      ...(error !== undefined && { error: serializeError(error) }),
    });
  }

  /**
   * Logger for a class or subsystem. Shares the pino instance, so no extra
   * pretty-print worker is spawned.
   */
  child(context: string): LoggerService {
    return new LoggerService({}, { ...this.bindings, context }, this.pino);
  }

  withCorrelationId(correlationId: string): LoggerService {
    return new LoggerService({}, { ...this.bindings, correlationId }, this.pino);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    this.pino[level]({ ...this.bindings, msg: message, ...context });
  }
}
