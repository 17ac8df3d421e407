import { EmailService, findContentIds } from '../email-service';
import { RenderedReport } from '../../types/models/email';
import { ComposeError } from '../../utils/errors/report-errors';

describe('EmailService', () => {
  let emailService: EmailService;

  const chart = {
    contentId: 'hourly-revenue@daily-report',
    filename: 'hourly-revenue.png',
    mimeType: 'image/png',
    content: Buffer.from('not really a png'),
  };

  const report: RenderedReport = {
    subject: 'Daily Report - 01/05/2024 - MG Road',
    html: '<html><body><h1>Report</h1><img src="cid:hourly-revenue@daily-report" /></body></html>',
    text: 'Daily Business Report - 01/05/2024\n',
    assets: [chart],
  };

  const csv = { filename: 'report_2024-05-01_mg-road.csv', content: 'Owner Name\nAsha\n' };

  const params = {
    report,
    attachments: [csv],
    recipient: 'owner@example.com',
    from: 'reports@example.com',
  };

  beforeEach(() => {
    emailService = new EmailService();
  });

  describe('compose', () => {
    it('should build a message with inline images and CSV attachments', () => {
      const message = emailService.compose(params);

      expect(message.recipient).toBe('owner@example.com');
      expect(message.subject).toBe('Daily Report - 01/05/2024 - MG Road');
      expect(message.contentIds).toEqual(['hourly-revenue@daily-report']);
      expect(message.attachmentNames).toEqual(['report_2024-05-01_mg-road.csv']);
      expect(message.mail).toEqual({
        from: 'reports@example.com',
        to: 'owner@example.com',
        subject: 'Daily Report - 01/05/2024 - MG Road',
        text: report.text,
        html: report.html,
        attachments: [
          {
            filename: 'hourly-revenue.png',
            content: chart.content,
            contentType: 'image/png',
            cid: 'hourly-revenue@daily-report',
            contentDisposition: 'inline',
          },
          {
            filename: 'report_2024-05-01_mg-road.csv',
            content: 'Owner Name\nAsha\n',
            contentType: 'text/csv; charset=utf-8',
          },
        ],
      });
    });

    it('should accept names that look like content ids in the document text', () => {
      const html = report.html.replace('<h1>Report</h1>', '<td>Service cid:x</td>');

      const message = emailService.compose({ ...params, report: { ...report, html } });

      expect(message.contentIds).toEqual(['hourly-revenue@daily-report']);
    });

    it('should let the caller override the subject', () => {
      expect(emailService.compose({ ...params, subject: 'Custom' }).subject).toBe('Custom');
    });

    it('should reject a reference without an inline asset', () => {
      const html = `${report.html}<img src="cid:extra@daily-report" />`;

      expect(() => emailService.compose({ ...params, report: { ...report, html } })).toThrow(
        new ComposeError('No inline asset for reference(s): extra@daily-report'),
      );
    });

    it('should reject an inline asset the document never references', () => {
      const unused = { ...chart, contentId: 'unused@daily-report' };

      expect(() =>
        emailService.compose({ ...params, report: { ...report, assets: [chart, unused] } }),
      ).toThrow('Inline asset(s) not referenced by the document: unused@daily-report');
    });

    it('should reject duplicate content ids', () => {
      expect(() =>
        emailService.compose({ ...params, report: { ...report, assets: [chart, chart] } }),
      ).toThrow('Duplicate inline asset id "hourly-revenue@daily-report"');
    });

    it('should require a recipient', () => {
      expect(() => emailService.compose({ ...params, recipient: '  ' })).toThrow(ComposeError);
    });
  });

  describe('buildRawMessage', () => {
    it('should place inline images in a related part beside the HTML', async () => {
      const raw = (await emailService.buildRawMessage(emailService.compose(params))).toString('utf8');

      expect(raw).toContain('multipart/mixed');
      expect(raw).toContain('multipart/related');
      expect(raw).toMatch(/content-id: <hourly-revenue@daily-report>/i);
      expect(raw).toContain('report_2024-05-01_mg-road.csv');
      expect(raw).toMatch(/^To: owner@example\.com\r?$/m);
    });
  });

  describe('findContentIds', () => {
    it('should return distinct references in order of first use', () => {
      const html = `<img src="cid:b@x"><img SRC = 'cid:a@x'><img src="cid:b@x">`;

      expect(findContentIds(html)).toEqual(['b@x', 'a@x']);
    });

    it('should ignore cid text outside image sources', () => {
      const html = `<td>Wash cid:promo</td><div style="background:url(cid:bg@x)"></div><img src="cid:a@x">`;

      expect(findContentIds(html)).toEqual(['a@x']);
    });
  });
});
