import { RunStatus } from '../../types/common/enums';
import { RenderedReport } from '../../types/models/email';
import { RunSummary } from '../../types/models/run';
import { formatCurrency } from '../../utils/money';
import { BASE_STYLES, display, escapeHtml, money, page, section, table } from './html';

const STATUS_STYLES = `
  .sent { color: #28a745; }
  .skipped { color: #6c757d; }
  .failed { color: #dc3545; }
`;

/**
 * Admin email describing the outcome of a run
 */
export const renderRunSummary = (summary: RunSummary, currencySymbol: string): RenderedReport => {
  const title = 'Daily Report Run Summary';
  const dateLabel = summary.reportDate ?? 'owner local date';
  const { counts, totals } = summary;

  const body = `
    <div class="header">
      <h1>${title}</h1>
      <p>Report date: ${escapeHtml(dateLabel)}</p>
      <p>Trigger: ${escapeHtml(summary.triggerSource)}</p>
    </div>
    ${section(
      'Totals',
      table(
        ['Sent', 'Skipped', 'Failed', 'Owners', 'Records', 'Revenue'],
        [
          [
            String(counts.sent),
            String(counts.skipped),
            String(counts.failed),
            String(counts.total),
            String(totals.records),
            money(totals.amount, currencySymbol),
          ],
        ],
      ),
    )}
    ${section(
      'Owners',
      table(
        ['Owner', 'Email', 'Status', 'Detail', 'Records', 'Revenue', 'Template'],
        summary.results.map((result) => [
          display(result.ownerName),
          display(result.email),
          `<span class="${result.status}">${result.status.toUpperCase()}</span>`,
          display(result.reason),
          String(result.recordCount),
          money(result.amount, currencySymbol),
          result.templateUsed !== undefined ? String(result.templateUsed) : 'N/A',
        ]),
      ),
    )}`;

  const failures = summary.results.filter((result) => result.status === RunStatus.FAILED);
  const text = [
    `${title} - ${dateLabel}`,
    '',
    `Trigger: ${summary.triggerSource}`,
    `Sent: ${counts.sent}, Skipped: ${counts.skipped}, Failed: ${counts.failed}, Total: ${counts.total}`,
    `Records: ${totals.records}`,
    `Revenue: ${formatCurrency(totals.amount, currencySymbol)}`,
    ...(failures.length > 0
      ? ['', 'FAILURES:', ...failures.map((result) => `${result.ownerName}: ${result.reason ?? 'unknown error'}`)]
      : []),
  ].join('\n') + '\n';

  return {
    subject: `${title} - ${dateLabel}`,
    html: page(title, BASE_STYLES + STATUS_STYLES, body),
    text,
    assets: [],
  };
};
