import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { SmtpConfig } from '@diffwatch/shared';

/**
 * The part of a nodemailer transporter the notifier uses.
 */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
  close(): void;
}

/**
 * SMTP submission with STARTTLS required and authenticated login.
 */
export function createSmtpTransport(config: SmtpConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: false,
    requireTLS: true,
    auth: {
      user: config.username,
      pass: config.password,
    },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });
}
