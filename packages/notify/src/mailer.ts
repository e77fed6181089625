import { NotificationError } from '@diffwatch/shared';
import type { Logger } from '@diffwatch/shared';
import { toHtml } from './render';
import type { MailTransport } from './transport';

export interface NotifierOptions {
  /** Envelope and header sender */
  from: string;
  transport: MailTransport;
  logger?: Logger;
}

export interface Delivery {
  recipient: string;
  subject: string;
  /** False when the body was already an HTML document */
  renderedFromMarkdown: boolean;
}

/**
 * Sends the analysis verdict as a multipart message: the raw body as the text
 * part and an HTML alternative.
 */
export class Notifier {
  private readonly from: string;
  private readonly transport: MailTransport;
  private readonly logger?: Logger;

  constructor(options: NotifierOptions) {
    this.from = options.from;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  async notify(recipient: string, subject: string, body: string): Promise<Delivery> {
    const { html, renderedFromMarkdown } = toHtml(body);

    try {
      await this.transport.sendMail({
        from: this.from,
        to: recipient,
        subject,
        text: body,
        html,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      await this.logger?.error(cause, 'Failed to send email');
      throw new NotificationError(`Failed to send email to ${recipient}: ${cause.message}`, { cause });
    }

    await this.logger?.info('Email sent successfully.');
    return { recipient, subject, renderedFromMarkdown };
  }

  close(): void {
    this.transport.close();
  }
}
