import { describe, it, expect, rs, beforeEach } from '@rstest/core';
import { InternalServerErrorException } from '@nestjs/common';
import { MailController } from './mail.controller';
import type { MailDispatcher } from './mail-dispatcher.service';
import { ok, internal } from '../common/result';

describe('MailController', () => {
  let controller: MailController;
  let mockDispatcher: Partial<MailDispatcher>;

  const body = {
    template_name: 'welcome.html',
    subject: 'Welcome',
    recipients: ['alice@example.com'],
    context: { name: 'Alice' },
    attachments: ['/tmp/report.pdf'],
  };

  beforeEach(() => {
    mockDispatcher = {
      send: rs.fn(),
    };

    controller = new MailController(mockDispatcher as MailDispatcher);
  });

  describe('sendEmail', () => {
    it('should pass the request to the dispatcher', async () => {
      rs.mocked(mockDispatcher.send!).mockResolvedValue(
        ok({ recipients: ['alice@example.com'], attachments: [], skippedAttachments: [] }),
      );

      await controller.sendEmail(body);

      expect(mockDispatcher.send).toHaveBeenCalledWith({
        templateName: 'welcome.html',
        subject: 'Welcome',
        recipients: ['alice@example.com'],
        context: { name: 'Alice' },
        attachments: ['/tmp/report.pdf'],
      });
    });

    it('should return the success envelope', async () => {
      rs.mocked(mockDispatcher.send!).mockResolvedValue(
        ok({ recipients: ['alice@example.com'], attachments: [], skippedAttachments: [] }),
      );

      expect(await controller.sendEmail(body)).toEqual({
        status: 'success',
        message: 'Email sent successfully',
      });
    });

    it('should map a failed send to 500 with the error text', async () => {
      rs.mocked(mockDispatcher.send!).mockResolvedValue(
        internal('Failed to send email: Connection refused'),
      );

      await expect(controller.sendEmail(body)).rejects.toThrow(
        InternalServerErrorException,
      );
      await expect(controller.sendEmail(body)).rejects.toThrow(
        'Failed to send email: Connection refused',
      );
    });
  });
});
