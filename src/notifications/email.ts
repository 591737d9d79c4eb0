/**
 * Certificate email notifications (nodemailer).
 *
 * Sending is best effort: a failed or unconfigured send returns false and is
 * logged, it never fails the generation it belongs to.
 */

import { Transporter, createTransport } from 'nodemailer';
import { certificatePath } from '../domain/certificate';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { escapeHtml } from '../render/certificate-page';

export interface EmailServiceOptions {
  /** Null when SMTP is not configured. */
  transporter: Transporter | null;
  from: string;
  fromName: string;
  appUrl: string;
  logger?: Logger;
}

export interface CertificateEmail {
  name: string;
  email: string;
  slug: string;
}

export const CERTIFICATE_EMAIL_SUBJECT = 'Your certificate is ready';

export class EmailService {
  private readonly log: Logger;

  constructor(private readonly options: EmailServiceOptions) {
    this.log = options.logger ?? rootLogger.child({ module: 'email' });
  }

  get configured(): boolean {
    return this.options.transporter !== null;
  }

  certificateUrl(slug: string): string {
    return `${this.options.appUrl.replace(/\/+$/, '')}${certificatePath(slug)}`;
  }

  async sendCertificate(message: CertificateEmail): Promise<boolean> {
    const transporter = this.options.transporter;
    if (!transporter) {
      this.log.debug('Email not configured; skipping', { slug: message.slug });
      return false;
    }

    const url = this.certificateUrl(message.slug);
    const name = escapeHtml(message.name);
    try {
      await transporter.sendMail({
        from: { name: this.options.fromName, address: this.options.from },
        to: message.email,
        subject: CERTIFICATE_EMAIL_SUBJECT,
        text: `Hello ${message.name},\n\nYour certificate is ready. View and download it here:\n${url}\n`,
        html: `<p>Hello ${name},</p><p>Your certificate is ready.</p><p><a href="${escapeHtml(url)}">View your certificate</a></p>`,
      });
      this.log.info('Certificate email sent', { slug: message.slug });
      return true;
    } catch (err) {
      this.log.error('Certificate email failed', { slug: message.slug, ...errorContext(err) });
      return false;
    }
  }
}

/** Build the SMTP transport, or null when no SMTP URL is configured. */
export function createMailTransport(smtpUrl: string | undefined): Transporter | null {
  return smtpUrl ? createTransport(smtpUrl) : null;
}
