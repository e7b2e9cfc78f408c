import nodemailer from 'nodemailer';
import type { EmailConfig } from '../config.js';
import { getEmailCredentials, getRecipient } from '../config.js';
import type { DigestMessage } from './digest.js';

export interface SmtpSettings {
  user: string;
  password: string;
  fromName: string;
  smtp: {
    host: string;
    port: number;
    secure: boolean;
  };
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
  attachments?: Array<{
    filename: string;
    content: Buffer | string;
    contentType?: string;
    cid?: string;
  }>;
}

export type SendResult =
  | { ok: true; messageId: string }
  | { ok: false; reason: string };

/**
 * Anything that can deliver the digest. Implementations never throw.
 */
export interface Mailer {
  dispatch(message: DigestMessage): Promise<SendResult>;
}

export class EmailClient {
  private settings: SmtpSettings;
  private transporter: nodemailer.Transporter | null = null;

  constructor(settings: SmtpSettings) {
    this.settings = settings;
  }

  /**
   * Send an email
   */
  async send(email: OutgoingEmail): Promise<string> {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: this.settings.smtp.host,
        port: this.settings.smtp.port,
        secure: this.settings.smtp.secure,
        auth: {
          user: this.settings.user,
          pass: this.settings.password,
        },
      });
    }

    const info = await this.transporter.sendMail({
      from: `"${this.settings.fromName}" <${this.settings.user}>`,
      to: email.to,
      subject: email.subject,
      text: email.text,
      html: email.html,
      attachments: email.attachments,
    });

    return info.messageId;
  }

  /**
   * Close any open connections
   */
  close(): void {
    if (this.transporter) {
      this.transporter.close();
      this.transporter = null;
    }
  }
}

/**
 * Sends the digest over SMTP. Credentials and recipient are read from the
 * environment at send time, so a missing variable fails the dispatch rather
 * than the process.
 */
export class DigestMailer implements Mailer {
  private client: EmailClient | null = null;

  constructor(private readonly config: EmailConfig) {}

  async dispatch(message: DigestMessage): Promise<SendResult> {
    try {
      const to = getRecipient();
      const client = this.getClient();
      const messageId = await client.send({
        to,
        subject: message.subject,
        text: message.text,
        html: message.html,
        attachments: message.attachments.map((a) => ({
          filename: a.filename,
          content: a.content,
          contentType: a.contentType,
          cid: a.cid,
        })),
      });
      console.log(`[mail] digest sent to ${to} (${messageId})`);
      return { ok: true, messageId };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[mail] digest not sent: ${reason}`);
      return { ok: false, reason };
    }
  }

  close(): void {
    this.client?.close();
    this.client = null;
  }

  private getClient(): EmailClient {
    if (!this.client) {
      const { user, password } = getEmailCredentials();
      this.client = new EmailClient({
        user,
        password,
        fromName: this.config.fromName,
        smtp: this.config.smtp,
      });
    }
    return this.client;
  }
}
