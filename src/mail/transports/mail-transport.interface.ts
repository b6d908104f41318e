/**
 * Mail Transport Interface
 *
 * Implemented by the SMTP transport and the console transport.
 */
import type { OutboundMessage } from '../interfaces/outbound-message.interface';

export const MAIL_TRANSPORT = 'MAIL_TRANSPORT';

export interface MailTransport {
  /**
   * Deliver the message to every recipient, or reject
   */
  send(message: OutboundMessage): Promise<void>;

  /**
   * Transport name, for logging
   */
  getName(): string;
}
