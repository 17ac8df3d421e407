import Mail from 'nodemailer/lib/mailer';

/**
 * Binary image embedded in the message and referenced as cid:<contentId>
 */
export interface InlineAsset {
  contentId: string;
  filename: string;
  mimeType: string;
  content: Buffer;
}

export interface RenderedReport {
  subject: string;
  html: string;
  text: string;
  assets: InlineAsset[];
}

export interface CsvAttachment {
  filename: string;
  content: string;
}

export interface ComposeParams {
  report: RenderedReport;
  attachments: CsvAttachment[];
  recipient: string;
  from: string;
  subject?: string;
}

/**
 * Self-contained message ready for a transport
 */
export interface ComposedMessage {
  recipient: string;
  subject: string;
  mail: Mail.Options;
  contentIds: string[];
  attachmentNames: string[];
}
