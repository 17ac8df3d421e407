import MailComposer from 'nodemailer/lib/mail-composer';
import Mail from 'nodemailer/lib/mailer';
import { ComposeParams, ComposedMessage, InlineAsset } from '../types/models/email';
import { ComposeError } from '../utils/errors/report-errors';

// Only src attribute values count as references
const CID_REFERENCE = /\bsrc\s*=\s*(["'])cid:([^"']+)\1/gi;

/**
 * Distinct content ids referenced from image sources, in order of first use
 */
export const findContentIds = (html: string): string[] =>
  Array.from(new Set(Array.from(html.matchAll(CID_REFERENCE), (match) => match[2])));

const checkAssets = (html: string, assets: readonly InlineAsset[]): string[] => {
  const ids = new Set<string>();
  for (const asset of assets) {
    if (ids.has(asset.contentId)) {
      throw new ComposeError(`Duplicate inline asset id "${asset.contentId}"`);
    }
    ids.add(asset.contentId);
  }

  const referenced = findContentIds(html);
  const missing = referenced.filter((id) => !ids.has(id));
  if (missing.length > 0) {
    throw new ComposeError(`No inline asset for reference(s): ${missing.join(', ')}`);
  }

  const unused = assets.filter((asset) => !referenced.includes(asset.contentId));
  if (unused.length > 0) {
    throw new ComposeError(
      `Inline asset(s) not referenced by the document: ${unused.map((asset) => asset.contentId).join(', ')}`,
    );
  }

  return referenced;
};

/**
 * Serialises a composed message to raw MIME
 */
export const buildRawMessage = (message: ComposedMessage): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    new MailComposer(message.mail).compile().build((error, raw) => {
      if (error) {
        reject(error);
      } else {
        resolve(raw);
      }
    });
  });

/**
 * Service for assembling report emails. Inline images carry a content id so
 * nodemailer groups them with the HTML in a multipart/related part; CSVs are
 * regular attachments.
 */
export class EmailService {
  /**
   * @throws ComposeError when the document and its inline assets disagree
   */
  compose(params: ComposeParams): ComposedMessage {
    const { report, attachments, recipient, from } = params;

    if (recipient.trim().length === 0) {
      throw new ComposeError('Recipient is required');
    }

    const contentIds = checkAssets(report.html, report.assets);
    const subject = params.subject ?? report.subject;

    const mail: Mail.Options = {
      from,
      to: recipient,
      subject,
      text: report.text,
      html: report.html,
      attachments: [
        ...report.assets.map((asset) => ({
          filename: asset.filename,
          content: asset.content,
          contentType: asset.mimeType,
          cid: asset.contentId,
          contentDisposition: 'inline' as const,
        })),
        ...attachments.map((attachment) => ({
          filename: attachment.filename,
          content: attachment.content,
          contentType: 'text/csv; charset=utf-8',
        })),
      ],
    };

    return {
      recipient,
      subject,
      mail,
      contentIds,
      attachmentNames: attachments.map((attachment) => attachment.filename),
    };
  }

  buildRawMessage(message: ComposedMessage): Promise<Buffer> {
    return buildRawMessage(message);
  }
}
