/**
 * Mail Dispatcher
 *
 * Renders a stored template and hands the resulting message to the
 * configured transport. One attempt per call: no queue, no retry.
 * Every failure comes back as an `internal` result; nothing is thrown.
 */
import { Injectable, Inject } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { SERVICE_CONFIG, type ServiceConfig } from '../config/service-config.interface';
import { LoggerService } from '../logging/logger.service';
import { ok, internal, errorMessage, type OperationResult } from '../common/result';
import { hasErrorCode } from '../common/fs-errors';
import { TemplateRenderer } from '../templates/template-renderer.service';
import type { RenderContext } from '../templates/template.interface';
import type {
  MailAttachment,
  OutboundMessage,
} from './interfaces/outbound-message.interface';
import { MAIL_TRANSPORT, type MailTransport } from './transports/mail-transport.interface';

export const ATTACHMENT_CONTENT_TYPE = 'application/octet-stream';

export interface SendEmailCommand {
  templateName: string;
  subject: string;
  recipients: string[];
  context: RenderContext;
  /** Local file paths; missing files are skipped */
  attachments: string[];
}

export interface SendSummary {
  recipients: string[];
  /** Basenames of the files attached */
  attachments: string[];
  /** Paths that did not exist */
  skippedAttachments: string[];
}

interface LoadedAttachments {
  attached: MailAttachment[];
  skipped: string[];
}

@Injectable()
export class MailDispatcher {
  private readonly logger: LoggerService;

  constructor(
    @Inject(TemplateRenderer) private readonly renderer: TemplateRenderer,
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
    @Inject(SERVICE_CONFIG) private readonly config: Readonly<ServiceConfig>,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child('MailDispatcher');
  }

  async send(command: SendEmailCommand): Promise<OperationResult<SendSummary>> {
    try {
      const html = await this.renderer.renderByName(
        command.templateName,
        command.context,
      );
      if (!html.ok) {
        return this.fail(command, html.error.message);
      }

      const { attached, skipped } = await this.loadAttachments(command.attachments);

      const message: OutboundMessage = {
        from: this.config.smtp.from,
        to: [...command.recipients],
        subject: command.subject,
        html: html.value,
        attachments: attached,
      };

      await this.transport.send(message);

      const summary: SendSummary = {
        recipients: message.to,
        attachments: attached.map((attachment) => attachment.filename),
        skippedAttachments: skipped,
      };

      this.logger.info('Email sent successfully', {
        ...summary,
        template: command.templateName,
        transport: this.transport.getName(),
      });

      return ok(summary);
    } catch (error) {
      return this.fail(command, errorMessage(error), error);
    }
  }

  /**
   * Read each attachment path; paths that do not exist are skipped with a warning
   */
  async loadAttachments(paths: string[]): Promise<LoadedAttachments> {
    const attached: MailAttachment[] = [];
    const skipped: string[] = [];

    for (const attachmentPath of paths) {
      let content: Buffer;

      try {
        content = await fs.promises.readFile(attachmentPath);
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
          this.logger.warn('Attachment not found, skipping', { path: attachmentPath });
          skipped.push(attachmentPath);
          continue;
        }
        throw error;
      }

      attached.push({
        filename: path.basename(attachmentPath),
        content,
        contentType: ATTACHMENT_CONTENT_TYPE,
      });
    }

    return { attached, skipped };
  }

  private fail(
    command: SendEmailCommand,
    reason: string,
    error?: unknown,
  ): OperationResult<SendSummary> {
    this.logger.error('Failed to send email', error ?? reason, {
      recipients: command.recipients,
      template: command.templateName,
    });

    return internal(`Failed to send email: ${reason}`);
  }
}
