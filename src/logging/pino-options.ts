import pino, { type LoggerOptions } from 'pino';
import { DEFAULT_REDACT_PATHS, type LoggerModuleOptions } from './logger.interface';

const DEFAULT_SERVICE_NAME = 'template-mailer-service';

/**
 * Defaults (unless disabled), then module options, then LOG_REDACT_PATHS.
 * Duplicates are dropped, first occurrence wins.
 */
export function resolveRedactPaths(
  options: LoggerModuleOptions,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const fromEnv = (env.LOG_REDACT_PATHS ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  return [
    ...new Set([
      ...(options.disableDefaultRedaction ? [] : DEFAULT_REDACT_PATHS),
      ...(options.redactPaths ?? []),
      ...fromEnv,
    ]),
  ];
}

export function buildPinoOptions(
  options: LoggerModuleOptions,
  env: NodeJS.ProcessEnv = process.env,
): LoggerOptions {
  const redactPaths = resolveRedactPaths(options, env);
  const pretty = options.pretty ?? (env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test');

  const pinoOptions: LoggerOptions = {
    level: options.level ?? env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: options.serviceName ?? env.SERVICE_NAME ?? DEFAULT_SERVICE_NAME,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (redactPaths.length > 0) {
    pinoOptions.redact = {
      paths: redactPaths,
      censor: options.redactCensor ?? '[REDACTED]',
    };
  }

  if (pretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoOptions;
}
