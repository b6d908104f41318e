/**
 * Outbound Message
 *
 * Built per send request and discarded afterwards; never persisted.
 */
export interface MailAttachment {
  /** Basename of the source path, used in Content-Disposition */
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface OutboundMessage {
  from: string;
  /** Recipients in request order */
  to: string[];
  subject: string;
  html: string;
  attachments: MailAttachment[];
}
