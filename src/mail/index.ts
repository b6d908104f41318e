/**
 * Mail
 *
 * Template-based sending over SMTP, with a console transport for local development.
 *
 * @packageDocumentation
 */

export { MailModule, createMailTransport } from './mail.module';
export { MailDispatcher, ATTACHMENT_CONTENT_TYPE } from './mail-dispatcher.service';
export type { SendEmailCommand, SendSummary } from './mail-dispatcher.service';
export { MailController } from './mail.controller';
export { MAIL_TRANSPORT } from './transports/mail-transport.interface';
export type { MailTransport } from './transports/mail-transport.interface';
export { SmtpMailTransport } from './transports/smtp.transport';
export { ConsoleMailTransport } from './transports/console.transport';
export type {
  OutboundMessage,
  MailAttachment,
} from './interfaces/outbound-message.interface';
