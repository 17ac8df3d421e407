import { DayWindow } from '../types/models/calendar';
import { CsvAttachment } from '../types/models/email';
import { BreakdownEntry, ReportSummary, isConsolidated } from '../types/models/report';
import { EnrichedRecord } from '../types/models/transaction';
import { averageOf, formatAmount, formatPercent } from '../utils/money';
import { formatInWindow } from './calendar-service';

type CsvValue = string | number | null;

export const REPORT_HEADERS = [
  'Owner Name',
  'Phone',
  'Vehicle Number',
  'Vehicle Model',
  'Vehicle Type',
  'Service Type',
  'Price',
  'Payment Mode',
  'Payer Account',
  'Entry Type',
  'Date',
  'Location',
];

export const PAYMENT_HEADERS = [
  'Payment Mode',
  'Vehicle Count',
  'Total Revenue',
  'Percentage of Total',
  'Payer Accounts',
];

export const SERVICE_HEADERS = [
  'Service Type',
  'Vehicle Count',
  'Total Revenue',
  'Average Price',
  'Percentage of Revenue',
];

/**
 * Quotes a field when it holds a comma, quote or line break. Line breaks
 * inside a field are flattened to spaces so every record stays on one line.
 */
export const csvEscape = (value: CsvValue): string => {
  if (value === null) {
    return '';
  }
  const text = String(value).trim();
  if (/[,"\r\n]/.test(text)) {
    return `"${text.replace(/\r\n|\r|\n/g, ' ').replace(/"/g, '""')}"`;
  }
  return text;
};

/**
 * Header plus one line per row, newline separated with a trailing newline.
 * No rows means no payload.
 */
export const toCsv = (headers: readonly string[], rows: readonly CsvValue[][]): string => {
  if (rows.length === 0) {
    return '';
  }
  return [headers, ...rows].map((row) => row.map(csvEscape).join(',')).join('\n') + '\n';
};

export const slugify = (name: string): string =>
  name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'location';

export const locationToken = (summary: ReportSummary): string =>
  isConsolidated(summary) ? 'consolidated' : slugify(summary.location.name);

const describePayers = (payers: readonly BreakdownEntry[]): string =>
  payers.length === 0
    ? 'N/A'
    : payers.map((payer) => `${payer.label}: ${formatAmount(payer.amount)} (${payer.count} vehicles)`).join('; ');

/**
 * Service for building the CSV attachments of a report
 */
export class AttachmentService {
  buildReportCsv(summary: ReportSummary, window: DayWindow): string {
    const locationNames = new Map<string, string>(
      isConsolidated(summary)
        ? summary.locations.map((entry): [string, string] => [entry.location.id, entry.location.name])
        : [[summary.location.id, summary.location.name]],
    );

    return toCsv(
      REPORT_HEADERS,
      summary.rows.map((row: EnrichedRecord) => [
        row.owner.name,
        row.owner.contact,
        row.vehicle.plate,
        row.vehicle.model,
        row.vehicle.type,
        row.record.service,
        formatAmount(row.record.amount),
        row.record.paymentMode,
        row.record.payerName,
        row.record.entryType,
        formatInWindow(row.record.createdAt, window),
        locationNames.get(row.record.locationId) ?? row.record.locationId,
      ]),
    );
  }

  buildPaymentCsv(summary: ReportSummary): string {
    return toCsv(
      PAYMENT_HEADERS,
      summary.paymentModes.map((mode) => [
        mode.label,
        mode.count,
        formatAmount(mode.amount),
        formatPercent(mode.amount, summary.totalAmount),
        describePayers(mode.payers),
      ]),
    );
  }

  buildServiceCsv(summary: ReportSummary): string {
    return toCsv(
      SERVICE_HEADERS,
      summary.services.map((service) => [
        service.label,
        service.count,
        formatAmount(service.amount),
        formatAmount(averageOf(service.amount, service.count)),
        formatPercent(service.amount, summary.totalAmount),
      ]),
    );
  }

  /**
   * Builds the report, payment and service attachments, leaving out any
   * without data rows
   */
  build(summary: ReportSummary, window: DayWindow): CsvAttachment[] {
    const suffix = `${window.date}_${locationToken(summary)}.csv`;
    const payloads: CsvAttachment[] = [
      { filename: `report_${suffix}`, content: this.buildReportCsv(summary, window) },
      { filename: `payment_${suffix}`, content: this.buildPaymentCsv(summary) },
      { filename: `service_${suffix}`, content: this.buildServiceCsv(summary) },
    ];
    return payloads.filter((payload) => payload.content.length > 0);
  }
}
