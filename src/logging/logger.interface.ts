export const LOGGER_MODULE_OPTIONS = 'LOGGER_MODULE_OPTIONS';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerModuleOptions {
  /** Falls back to LOG_LEVEL, then 'info' */
  level?: LogLevel;

  /** `service` field on every line. Falls back to SERVICE_NAME */
  serviceName?: string;

  /** Human-readable output through pino-pretty. Default: on outside production and test */
  pretty?: boolean;

  /**
   * Extra paths to redact, e.g. 'message.attachments[*].content'
   * LOG_REDACT_PATHS (comma-separated) is appended to these
   */
  redactPaths?: string[];

  /** Default: '[REDACTED]' */
  redactCensor?: string;

  /** Skip DEFAULT_REDACT_PATHS */
  disableDefaultRedaction?: boolean;
}

/**
 * SMTP credentials and anything that looks like a secret
 */
export const DEFAULT_REDACT_PATHS = [
  'password',
  '*.password',
  'pass',
  '*.pass',
  'auth.pass',
  'smtp.password',
  'token',
  '*.token',
  'secret',
  '*.secret',
  'apiKey',
  '*.apiKey',
];
