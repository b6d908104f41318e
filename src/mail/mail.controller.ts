import { Controller, Post, Body, HttpCode, Inject } from '@nestjs/common';
import { ApiBody, ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { unwrapResult } from '../common/result';
import { MailDispatcher } from './mail-dispatcher.service';
import {
  SendEmailSchema,
  toSendEmailCommand,
  type SendEmailRequest,
  type SendEmailResponse,
} from './dto/send-email.dto';

@ApiTags('mail')
@Controller()
export class MailController {
  constructor(@Inject(MailDispatcher) private readonly dispatcher: MailDispatcher) {}

  /**
   * Render a template and send it over SMTP
   */
  @Post('send-email')
  @HttpCode(200)
  @ApiBody({
    schema: {
      type: 'object',
      required: ['template_name', 'subject', 'recipients', 'context'],
      properties: {
        template_name: { type: 'string', example: 'welcome.html' },
        subject: { type: 'string' },
        recipients: { type: 'array', items: { type: 'string', format: 'email' } },
        context: { type: 'object', additionalProperties: { type: 'string' } },
        attachments: { type: 'array', items: { type: 'string' } },
      },
    },
  })
  async sendEmail(
    @Body(new ZodValidationPipe(SendEmailSchema)) body: SendEmailRequest,
  ): Promise<SendEmailResponse> {
    unwrapResult(await this.dispatcher.send(toSendEmailCommand(body)));

    return { status: 'success', message: 'Email sent successfully' };
  }
}
