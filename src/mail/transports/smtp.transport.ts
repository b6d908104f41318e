/**
 * SMTP Mail Transport
 *
 * Sends through nodemailer. Every send opens its own connection (no pool)
 * and closes it afterwards, whether or not the send succeeded.
 *
 * With useTls the session must be upgraded with STARTTLS before AUTH;
 * without it STARTTLS is never attempted. AUTH always runs with the
 * configured credentials.
 */
import { Injectable, Inject } from '@nestjs/common';
import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { SERVICE_CONFIG, type ServiceConfig } from '../../config/service-config.interface';
import { LoggerService } from '../../logging/logger.service';
import type { OutboundMessage } from '../interfaces/outbound-message.interface';
import type { MailTransport } from './mail-transport.interface';

/**
 * nodemailer message for an outbound message; attachments go out base64
 * with `Content-Disposition: attachment`
 */
export function toMailOptions(message: OutboundMessage): Mail.Options {
  return {
    from: message.from,
    to: message.to.join(', '),
    subject: message.subject,
    html: message.html,
    attachments: message.attachments.map((attachment) => ({
      filename: attachment.filename,
      content: attachment.content,
      contentType: attachment.contentType,
      contentDisposition: 'attachment' as const,
      contentTransferEncoding: 'base64' as const,
    })),
  };
}

@Injectable()
export class SmtpMailTransport implements MailTransport {
  private readonly logger: LoggerService;

  constructor(
    @Inject(SERVICE_CONFIG) private readonly config: Readonly<ServiceConfig>,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child('SmtpMailTransport');
  }

  /**
   * Connection options for one session
   *
   * @throws Error when SMTP_SERVER or SMTP_USERNAME is unset; nodemailer
   * would otherwise connect to localhost or skip AUTH
   */
  buildTransportOptions(): SMTPTransport.Options {
    const { host, port, username, password, useTls } = this.config.smtp;

    if (!host) {
      throw new Error('SMTP_SERVER is not configured');
    }
    if (!username) {
      throw new Error('SMTP_USERNAME is not configured');
    }

    return {
      host,
      port,
      secure: false,
      requireTLS: useTls,
      ignoreTLS: !useTls,
      auth: { user: username, pass: password },
    };
  }

  async send(message: OutboundMessage): Promise<void> {
    const transporter = nodemailer.createTransport(this.buildTransportOptions());

    this.logger.debug('Opening SMTP session', {
      host: this.config.smtp.host,
      port: this.config.smtp.port,
      starttls: this.config.smtp.useTls,
    });

    try {
      await transporter.sendMail(toMailOptions(message));
    } finally {
      transporter.close();
    }
  }

  getName(): string {
    return 'smtp';
  }
}
