/**
 * Service configuration
 *
 * Built once at startup by loadServiceConfig() and frozen.
 * Injected wherever needed through the SERVICE_CONFIG token.
 */
export const SERVICE_CONFIG = 'SERVICE_CONFIG';

export type MailTransportKind = 'smtp' | 'console';

export interface SmtpConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Issue STARTTLS before authenticating */
  useTls: boolean;
  /** Sender address; defaults to the SMTP username */
  from: string;
}

export interface ServiceConfig {
  smtp: Readonly<SmtpConfig>;
  transport: MailTransportKind;
  /** Absolute path of the template directory */
  templateDir: string;
  http: Readonly<{
    host: string;
    port: number;
  }>;
}
