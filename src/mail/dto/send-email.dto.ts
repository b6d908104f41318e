import { z } from 'zod';
import {
  RenderContextSchema,
  TemplateNameSchema,
} from '../../templates/dto/generate-html.dto';
import type { SendEmailCommand } from '../mail-dispatcher.service';

export const SendEmailSchema = z.object({
  template_name: TemplateNameSchema,
  subject: z.string(),
  recipients: z
    .array(z.string().email())
    .min(1, 'at least one recipient is required'),
  context: RenderContextSchema,
  attachments: z
    .array(z.string().min(1))
    .nullish()
    .transform((paths) => paths ?? []),
});

export type SendEmailRequest = z.infer<typeof SendEmailSchema>;

export interface SendEmailResponse {
  status: 'success';
  message: string;
}

export function toSendEmailCommand(request: SendEmailRequest): SendEmailCommand {
  return {
    templateName: request.template_name,
    subject: request.subject,
    recipients: request.recipients,
    context: request.context,
    attachments: request.attachments,
  };
}
