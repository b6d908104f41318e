import * as path from 'path';
import { z } from 'zod';
import { formatIssues } from '../common/zod-validation.pipe';
import type { ServiceConfig } from './service-config.interface';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const portSchema = (fallback: number) =>
  z.coerce.number().int().min(1).max(65535).default(fallback);

const EnvSchema = z.object({
  SMTP_SERVER: z.string().default(''),
  SMTP_PORT: portSchema(587),
  SMTP_USERNAME: z.string().default(''),
  SMTP_PASSWORD: z.string().default(''),
  USE_TLS: z
    .string()
    .default('true')
    .transform((value) => value.toLowerCase() === 'true'),
  MAIL_FROM: z.string().optional(),
  MAIL_TRANSPORT: z.enum(['smtp', 'console']).default('smtp'),
  TEMPLATE_DIR: z.string().min(1).default('templates'),
  PORT: portSchema(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
});

/**
 * Load service configuration from environment variables
 *
 * Variables that are set but empty fall back to their defaults.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param cwd - Directory a relative TEMPLATE_DIR is resolved against
 * @throws ConfigError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadServiceConfig();
 * // { smtp: { host: 'smtp.example.com', port: 587, ... }, templateDir: '/srv/templates', ... }
 * ```
 */
export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Readonly<ServiceConfig> {
  const nonEmpty = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(nonEmpty);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid service configuration: ${formatIssues(parsed.error.issues)}`,
    );
  }

  const vars = parsed.data;

  return Object.freeze({
    smtp: Object.freeze({
      host: vars.SMTP_SERVER,
      port: vars.SMTP_PORT,
      username: vars.SMTP_USERNAME,
      password: vars.SMTP_PASSWORD,
      useTls: vars.USE_TLS,
      from: vars.MAIL_FROM ?? vars.SMTP_USERNAME,
    }),
    transport: vars.MAIL_TRANSPORT,
    templateDir: path.resolve(cwd, vars.TEMPLATE_DIR),
    http: Object.freeze({
      host: vars.HOST,
      port: vars.PORT,
    }),
  });
}
