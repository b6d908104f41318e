import { describe, it, expect, rs } from '@rstest/core';
import { createMailTransport } from './mail.module';
import { SmtpMailTransport } from './transports/smtp.transport';
import { ConsoleMailTransport } from './transports/console.transport';
import { loadServiceConfig } from '../config/load-service-config';
import type { LoggerService } from '../logging/logger.service';

describe('createMailTransport', () => {
  const mockLogger = {
    child: rs.fn().mockReturnValue({}),
  } as unknown as LoggerService;

  it('should default to the SMTP transport', () => {
    const transport = createMailTransport(loadServiceConfig({}, '/srv'), mockLogger);

    expect(transport).toBeInstanceOf(SmtpMailTransport);
    expect(transport.getName()).toBe('smtp');
  });

  it('should create the console transport when configured', () => {
    const transport = createMailTransport(
      loadServiceConfig({ MAIL_TRANSPORT: 'console' }, '/srv'),
      mockLogger,
    );

    expect(transport).toBeInstanceOf(ConsoleMailTransport);
  });
});
