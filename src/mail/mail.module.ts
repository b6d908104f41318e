/**
 * Mail Module
 *
 * Provides MailDispatcher and the POST /send-email endpoint.
 *
 * Transport selection follows the MAIL_TRANSPORT setting:
 * - "smtp" (default): sends through the configured SMTP server
 * - "console": prints messages (local development)
 */
import { Module } from '@nestjs/common';
import { SERVICE_CONFIG, type ServiceConfig } from '../config/service-config.interface';
import { LoggerService } from '../logging/logger.service';
import { TemplatesModule } from '../templates/templates.module';
import { MailDispatcher } from './mail-dispatcher.service';
import { MailController } from './mail.controller';
import { MAIL_TRANSPORT, type MailTransport } from './transports/mail-transport.interface';
import { SmtpMailTransport } from './transports/smtp.transport';
import { ConsoleMailTransport } from './transports/console.transport';

export function createMailTransport(
  config: Readonly<ServiceConfig>,
  logger: LoggerService,
): MailTransport {
  if (config.transport === 'console') {
    return new ConsoleMailTransport(logger);
  }

  return new SmtpMailTransport(config, logger);
}

@Module({
  imports: [TemplatesModule],
  controllers: [MailController],
  providers: [
    MailDispatcher,
    {
      provide: MAIL_TRANSPORT,
      useFactory: createMailTransport,
      inject: [SERVICE_CONFIG, LoggerService],
    },
  ],
  exports: [MailDispatcher],
})
export class MailModule {}
