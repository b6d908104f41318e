/**
 * Console Mail Transport
 *
 * Prints messages instead of sending them. Selected with MAIL_TRANSPORT=console
 * for local development.
 */
import { Injectable, Inject } from '@nestjs/common';
import { LoggerService } from '../../logging/logger.service';
import type { OutboundMessage } from '../interfaces/outbound-message.interface';
import type { MailTransport } from './mail-transport.interface';

@Injectable()
export class ConsoleMailTransport implements MailTransport {
  private readonly logger: LoggerService;

  constructor(@Inject(LoggerService) logger: LoggerService) {
    this.logger = logger.child('ConsoleMailTransport');
  }

  async send(message: OutboundMessage): Promise<void> {
    const recipients = message.to.join(', ');
    const attachments = message.attachments.map((a) => a.filename);

    // Plain console output so the message is readable in a dev terminal
    console.log('\n========================================');
    console.log('📧 EMAIL (console transport - not actually sent)');
    console.log('========================================');
    console.log(`From:    ${message.from || '(not set)'}`);
    console.log(`To:      ${recipients}`);
    console.log(`Subject: ${message.subject}`);
    if (attachments.length > 0) {
      console.log(`Attachments: ${attachments.join(', ')}`);
    }
    console.log('----------------------------------------');
    console.log(message.html || '(no content)');
    console.log('========================================\n');

    this.logger.info('Email written to console', {
      recipients: message.to,
      subject: message.subject,
      attachments,
    });
  }

  getName(): string {
    return 'console';
  }
}
