/**
 * Activation notifiers
 *
 * Deliver the activation link to a newly registered user: over SMTP with
 * nodemailer, or only into the log when no mail server is configured.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { logger as defaultLogger, type Logger } from 'core-service';
import { buildActivationLink } from '../utils.js';
import type { ActivationNotifier, User } from '../types.js';

export const ACTIVATION_SUBJECT = 'activation of your account';

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
}

export interface EmailActivationNotifierOptions {
  /** Pre-built transporter (e.g. nodemailer's jsonTransport in tests) */
  transporter?: Transporter;
  logger?: Logger;
}

export class EmailActivationNotifier implements ActivationNotifier {
  private transporter: Transporter;
  private log: Logger;

  constructor(
    private smtp: SmtpSettings,
    private baseUrl: string,
    options: EmailActivationNotifierOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
    this.transporter = options.transporter ?? nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      auth: smtp.user ? {
        user: smtp.user,
        pass: smtp.password,
      } : undefined,
    });

    this.log.info('Activation mailer initialized', { host: smtp.host, port: smtp.port });
  }

  async sendActivation(user: User, token: string): Promise<void> {
    const link = buildActivationLink(this.baseUrl, token);
    const result = await this.transporter.sendMail({
      from: this.smtp.from,
      to: user.email,
      subject: ACTIVATION_SUBJECT,
      text: link,
    });

    this.log.info('Activation email sent', { userId: user.id, messageId: result.messageId });
  }
}

/**
 * Notifier for deployments without a mail server; records the send only
 */
export class NoopActivationNotifier implements ActivationNotifier {
  constructor(private log: Logger = defaultLogger) {}

  async sendActivation(user: User): Promise<void> {
    this.log.info('Activation email skipped (no SMTP host configured)', { userId: user.id });
  }
}
