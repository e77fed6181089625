import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NotificationError } from '@diffwatch/shared';
import type { Logger } from '@diffwatch/shared';
import { Notifier } from './mailer';
import type { MailTransport } from './transport';

describe('Notifier', () => {
  let transport: MailTransport & { sendMail: ReturnType<typeof vi.fn> };
  let logger: Logger;
  let notifier: Notifier;

  beforeEach(() => {
    transport = { sendMail: vi.fn().mockResolvedValue({ messageId: '<1@example.com>' }), close: vi.fn() };
    logger = {
      log: vi.fn(),
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    notifier = new Notifier({ from: 'diffwatch@example.com', transport, logger });
  });

  it('sends an HTML document unmodified as the HTML alternative', async () => {
    const body = '<html><body><h1>New upload endpoint</h1></body></html>';

    const delivery = await notifier.notify('sec@example.com', 'myrepo (branch: main) code update', body);

    expect(delivery).toEqual({
      recipient: 'sec@example.com',
      subject: 'myrepo (branch: main) code update',
      renderedFromMarkdown: false,
    });
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: 'diffwatch@example.com',
      to: 'sec@example.com',
      subject: 'myrepo (branch: main) code update',
      text: body,
      html: body,
    });
    expect(logger.info).toHaveBeenCalledWith('Email sent successfully.');
  });

  it('renders markdown bodies and keeps the raw text part', async () => {
    const delivery = await notifier.notify('sec@example.com', 'subject', '**New** feature');

    expect(delivery.renderedFromMarkdown).toBe(true);
    expect(transport.sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        text: '**New** feature',
        html: '<p><strong>New</strong> feature</p>\n',
      }),
    );
  });

  it('logs and throws NotificationError when the transport fails', async () => {
    const failure = new Error('Greeting never received');
    transport.sendMail.mockRejectedValue(failure);

    const error = await notifier.notify('sec@example.com', 'subject', 'body').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotificationError);
    expect(error).toMatchObject({
      message: 'Failed to send email to sec@example.com: Greeting never received',
      cause: failure,
    });
    expect(logger.error).toHaveBeenCalledWith(failure, 'Failed to send email');
    expect(logger.info).not.toHaveBeenCalled();
  });
});
