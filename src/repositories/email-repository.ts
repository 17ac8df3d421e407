import { SES } from '@aws-sdk/client-ses';
import nodemailer from 'nodemailer';
import { buildRawMessage } from '../services/email-service';
import { ComposedMessage } from '../types/models/email';
import { IEmailTransport } from '../types/services/email-transport';
import { TransportError, describeError } from '../utils/errors/report-errors';

export type EmailProvider = 'ses' | 'smtp';

/**
 * EMAIL_PROVIDER when set, otherwise SES in production and SMTP elsewhere
 */
export const resolveEmailProvider = (env: NodeJS.ProcessEnv = process.env): EmailProvider => {
  const provider = env.EMAIL_PROVIDER || (env.NODE_ENV === 'production' ? 'ses' : 'smtp');
  return provider === 'ses' ? 'ses' : 'smtp';
};

export class EmailRepository implements IEmailTransport {
  private ses: SES | null = null;
  private transporter: nodemailer.Transporter | null = null;

  constructor(provider: EmailProvider = resolveEmailProvider()) {
    if (provider === 'ses') {
      this.initializeSES();
    } else {
      this.initializeSMTP();
    }
  }

  /**
   * Creates and initializes a new instance of EmailRepository
   * @returns Promise with initialized EmailRepository instance
   */
  public static async initialize(): Promise<EmailRepository> {
    return new EmailRepository();
  }

  private initializeSES(): void {
    try {
      this.ses = new SES({
        region: process.env.AWS_REGION || 'us-east-1',
        apiVersion: '2010-12-01',
      });
      console.log('AWS SES client initialized successfully');
    } catch (error) {
      console.error('Error initializing AWS SES client:', error);
    }
  }

  private initializeSMTP(): void {
    try {
      this.transporter = nodemailer.createTransport({
        host: process.env.SMTP_HOST || 'localhost',
        port: Number(process.env.SMTP_PORT) || 1025,
        secure: false,
        auth:
          process.env.SMTP_AUTH === 'true'
            ? {
                user: process.env.SMTP_USER || '',
                pass: process.env.SMTP_PASSWORD || '',
              }
            : undefined,
      });

      console.log(
        `SMTP client initialized for ${process.env.SMTP_HOST || 'localhost'}:${process.env.SMTP_PORT || 1025}`,
      );
    } catch (error) {
      console.error('Error initializing SMTP client:', error);
    }
  }

  /**
   * Sends a composed message. SES receives the serialised MIME so inline
   * images and attachments arrive unchanged.
   * @throws TransportError when the provider rejects the message
   */
  async send(message: ComposedMessage): Promise<void> {
    try {
      if (this.ses) {
        await this.sendWithSES(message);
      } else if (this.transporter) {
        await this.transporter.sendMail(message.mail);
      } else {
        throw new Error('No email provider has been initialized');
      }

      console.log(`Report successfully sent to ${message.recipient}`);
    } catch (error) {
      console.error('Error sending email:', error);
      throw new TransportError(
        `Failed to send email to ${message.recipient}: ${describeError(error)}`,
        error,
      );
    }
  }

  /**
   * Checks the provider is reachable before any message is sent
   * @throws TransportError when it is not
   */
  async verifyConnection(): Promise<void> {
    try {
      if (this.ses) {
        await this.ses.getSendQuota({});
      } else if (this.transporter) {
        await this.transporter.verify();
      } else {
        throw new Error('No email provider has been initialized');
      }
    } catch (error) {
      console.error('Email provider check failed:', error);
      throw new TransportError(`Email provider unavailable: ${describeError(error)}`, error);
    }
  }

  private async sendWithSES(message: ComposedMessage): Promise<void> {
    if (!this.ses) {
      throw new Error('SES client not initialized');
    }

    const raw = await buildRawMessage(message);
    await this.ses.sendRawEmail({
      Destinations: [message.recipient],
      RawMessage: { Data: raw },
    });
  }
}
