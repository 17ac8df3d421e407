import { DayWindow } from '../../types/models/calendar';
import { BreakdownEntry, HourlyEntry, ReportSummary, isConsolidated } from '../../types/models/report';
import { averageOf, formatCurrency, formatPercent } from '../../utils/money';
import { displayDate } from '../calendar-service';

export const NOT_AVAILABLE = 'N/A';

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);

/**
 * Escaped text, or N/A when the value is missing or blank
 */
export const display = (value: string | null | undefined): string => {
  const trimmed = value?.trim();
  return trimmed ? escapeHtml(trimmed) : NOT_AVAILABLE;
};

/**
 * Currency amount ready for insertion into markup
 */
export const money = (minor: number, currency: string): string => escapeHtml(formatCurrency(minor, currency));

export const locationLabel = (summary: ReportSummary): string =>
  isConsolidated(summary) ? 'All Locations' : summary.location.name;

export const buildSubject = (title: string, summary: ReportSummary, window: DayWindow): string =>
  `${title} - ${displayDate(window)} - ${locationLabel(summary)}`;

export const BASE_STYLES = `
  body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
  .container { max-width: 800px; margin: 0 auto; padding: 20px; }
  .header { background-color: #f8f9fa; padding: 20px; border-radius: 5px; margin-bottom: 20px; }
  .section { margin-bottom: 30px; }
  .section-title { color: #2c3e50; border-bottom: 2px solid #eee; padding-bottom: 10px; margin-bottom: 15px; }
  table { width: 100%; border-collapse: collapse; margin-bottom: 20px; }
  th, td { padding: 12px; text-align: left; border-bottom: 1px solid #ddd; }
  th { background-color: #f8f9fa; }
  .empty { color: #888; font-style: italic; }
`;

/**
 * Table with escaped headers. Cells are inserted as given and must already
 * be escaped.
 */
export const table = (headers: readonly string[], rows: readonly string[][]): string => {
  if (rows.length === 0) {
    return `<p class="empty">${NOT_AVAILABLE}</p>`;
  }
  return `
    <table>
      <thead><tr>${headers.map((header) => `<th>${escapeHtml(header)}</th>`).join('')}</tr></thead>
      <tbody>
        ${rows.map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join('')}</tr>`).join('\n')}
      </tbody>
    </table>`;
};

export const section = (title: string, body: string): string => `
  <div class="section">
    <h2 class="section-title">${escapeHtml(title)}</h2>
    ${body}
  </div>`;

export const page = (title: string, styles: string, body: string): string => `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${escapeHtml(title)}</title>
    <style>${styles}</style>
  </head>
  <body>
    <div class="container">
      ${body}
    </div>
  </body>
</html>
`;

export const header = (title: string, summary: ReportSummary, window: DayWindow): string => `
  <div class="header">
    <h1>${escapeHtml(title)}</h1>
    <p>Location: ${escapeHtml(locationLabel(summary))}</p>
    <p>Date: ${displayDate(window)}</p>
  </div>`;

export const paymentTable = (summary: ReportSummary, currency: string): string =>
  table(
    ['Payment Mode', 'Vehicles', 'Revenue', 'Share', 'Payer Accounts'],
    summary.paymentModes.map((mode) => [
      display(mode.label),
      String(mode.count),
      money(mode.amount, currency),
      formatPercent(mode.amount, summary.totalAmount),
      mode.payers.length > 0
        ? mode.payers.map((payer) => `${display(payer.label)} (${payer.count})`).join(', ')
        : NOT_AVAILABLE,
    ]),
  );

export const serviceTable = (summary: ReportSummary, currency: string): string =>
  table(
    ['Service', 'Vehicles', 'Revenue', 'Average', 'Share'],
    summary.services.map((service) => [
      display(service.label),
      String(service.count),
      money(service.amount, currency),
      money(averageOf(service.amount, service.count), currency),
      formatPercent(service.amount, summary.totalAmount),
    ]),
  );

export const vehicleTypeTable = (summary: ReportSummary): string =>
  table(
    ['Vehicle Type', 'Vehicles', 'Share'],
    summary.vehicleTypes.map((type: BreakdownEntry) => [
      display(type.label),
      String(type.count),
      formatPercent(type.count, summary.count),
    ]),
  );

export const hourlyTable = (hourly: readonly HourlyEntry[], currency: string): string =>
  table(
    ['Hour', 'Vehicles', 'Revenue'],
    hourly.map((entry) => [
      entry.label,
      String(entry.count),
      money(entry.amount, currency),
    ]),
  );

/**
 * Per-location totals; empty for a single-location report
 */
export const locationTable = (summary: ReportSummary, currency: string): string =>
  isConsolidated(summary)
    ? section(
        'Locations',
        table(
          ['Location', 'Vehicles', 'Revenue'],
          summary.locations.map((entry) => [
            display(entry.location.name),
            String(entry.count),
            money(entry.totalAmount, currency),
          ]),
        ),
      )
    : '';
