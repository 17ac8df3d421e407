import { DayWindow } from '../types/models/calendar';
import { LocationRef } from '../types/models/location';
import {
  BreakdownEntry,
  ConsolidatedSummary,
  HourlyEntry,
  LocationSummary,
  PaymentModeEntry,
  ReportAggregate,
} from '../types/models/report';
import { EnrichedRecord } from '../types/models/transaction';
import { IReportService } from '../types/services/report-service';
import { averageOf } from '../utils/money';
import { hourInWindow } from './calendar-service';

export const UNSPECIFIED = 'unspecified';

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Largest amount first, ties broken by key so the order never depends on
 * the order records arrived in
 */
const byAmountThenKey = (a: BreakdownEntry, b: BreakdownEntry): number =>
  b.amount - a.amount || compareKeys(a.key, b.key);

export const paymentModeKey = (mode: string | null): string => {
  const normalized = mode?.trim().toLowerCase();
  return normalized ? normalized : UNSPECIFIED;
};

export const paymentModeLabel = (key: string): string => {
  if (key === UNSPECIFIED) {
    return 'Unspecified';
  }
  // Short codes are acronyms (UPI, NFC)
  return key.length <= 3 ? key.toUpperCase() : key.charAt(0).toUpperCase() + key.slice(1);
};

export const categoryKey = (value: string | null): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : UNSPECIFIED;
};

const categoryLabel = (key: string): string => (key === UNSPECIFIED ? 'Unspecified' : key);

export const hourLabel = (hour: number): string => {
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${hour12}:00 ${hour < 12 ? 'AM' : 'PM'}`;
};

interface Bucket {
  count: number;
  amount: number;
}

const addTo = (buckets: Map<string, Bucket>, key: string, count: number, amount: number): void => {
  const bucket = buckets.get(key);
  if (bucket) {
    bucket.count += count;
    bucket.amount += amount;
  } else {
    buckets.set(key, { count, amount });
  }
};

const addToHour = (hours: Map<number, Bucket>, hour: number, count: number, amount: number): void => {
  const bucket = hours.get(hour);
  if (bucket) {
    bucket.count += count;
    bucket.amount += amount;
  } else {
    hours.set(hour, { count, amount });
  }
};

const toEntries = (buckets: Map<string, Bucket>, label: (key: string) => string): BreakdownEntry[] =>
  Array.from(buckets.entries())
    .map(([key, bucket]) => ({ key, label: label(key), count: bucket.count, amount: bucket.amount }))
    .sort(byAmountThenKey);

const toPaymentEntries = (
  modes: Map<string, Bucket>,
  payers: Map<string, Map<string, Bucket>>,
): PaymentModeEntry[] =>
  toEntries(modes, paymentModeLabel).map((entry) => ({
    ...entry,
    payers: toEntries(payers.get(entry.key) ?? new Map<string, Bucket>(), (name) => name),
  }));

const toHourly = (hours: Map<number, Bucket>): HourlyEntry[] =>
  Array.from(hours.entries())
    .sort(([a], [b]) => a - b)
    .map(([hour, bucket]) => ({ hour, label: hourLabel(hour), count: bucket.count, amount: bucket.amount }));

const emptyAggregate = (): ReportAggregate => ({
  totalAmount: 0,
  count: 0,
  averageAmount: 0,
  paymentModes: [],
  services: [],
  vehicleTypes: [],
  hourly: [],
  rows: [],
});

/**
 * Hour with the highest revenue; the earliest one wins a tie
 */
export const peakHour = (aggregate: ReportAggregate): HourlyEntry | null =>
  aggregate.hourly.reduce<HourlyEntry | null>(
    (best, entry) => (best === null || entry.amount > best.amount ? entry : best),
    null,
  );

export const topService = (aggregate: ReportAggregate): BreakdownEntry | null =>
  aggregate.services[0] ?? null;

/**
 * Service for reducing transaction records into report summaries.
 * All arithmetic is on integer minor units.
 */
export class ReportService implements IReportService {
  /**
   * Reduces records into totals and breakdowns. Rows keep the order given.
   */
  aggregate(records: readonly EnrichedRecord[], window: DayWindow): ReportAggregate {
    const modes = new Map<string, Bucket>();
    const payers = new Map<string, Map<string, Bucket>>();
    const services = new Map<string, Bucket>();
    const vehicleTypes = new Map<string, Bucket>();
    const hours = new Map<number, Bucket>();
    let totalAmount = 0;

    for (const enriched of records) {
      const { record } = enriched;
      const modeKey = paymentModeKey(record.paymentMode);

      totalAmount += record.amount;
      addTo(modes, modeKey, 1, record.amount);
      addTo(services, categoryKey(record.service), 1, record.amount);
      addTo(vehicleTypes, categoryKey(enriched.vehicle.type), 1, record.amount);

      addToHour(hours, hourInWindow(record.createdAt, window), 1, record.amount);

      if (record.payerName) {
        const modePayers = payers.get(modeKey) ?? new Map<string, Bucket>();
        addTo(modePayers, record.payerName, 1, record.amount);
        payers.set(modeKey, modePayers);
      }
    }

    return {
      totalAmount,
      count: records.length,
      averageAmount: averageOf(totalAmount, records.length),
      paymentModes: toPaymentEntries(modes, payers),
      services: toEntries(services, categoryLabel),
      vehicleTypes: toEntries(vehicleTypes, categoryLabel),
      hourly: toHourly(hours),
      rows: [...records],
    };
  }

  summarizeLocation(
    location: LocationRef,
    records: readonly EnrichedRecord[],
    window: DayWindow,
  ): LocationSummary {
    return { ...this.aggregate(records, window), location };
  }

  /**
   * Merges location summaries into one. Rows and locations are concatenated
   * in the order given; no summaries yields an all-zero result.
   */
  consolidate(summaries: readonly LocationSummary[]): ConsolidatedSummary {
    const merged = summaries.reduce<ReportAggregate>((acc, summary) => {
      const totalAmount = acc.totalAmount + summary.totalAmount;
      const count = acc.count + summary.count;
      return {
        totalAmount,
        count,
        averageAmount: averageOf(totalAmount, count),
        paymentModes: mergePaymentModes(acc.paymentModes, summary.paymentModes),
        services: mergeEntries(acc.services, summary.services),
        vehicleTypes: mergeEntries(acc.vehicleTypes, summary.vehicleTypes),
        hourly: mergeHourly(acc.hourly, summary.hourly),
        rows: [...acc.rows, ...summary.rows],
      };
    }, emptyAggregate());

    return { ...merged, locations: [...summaries] };
  }
}

const mergeEntries = (a: BreakdownEntry[], b: BreakdownEntry[]): BreakdownEntry[] => {
  const labels = new Map<string, string>();
  const buckets = new Map<string, Bucket>();
  for (const entry of [...a, ...b]) {
    labels.set(entry.key, entry.label);
    addTo(buckets, entry.key, entry.count, entry.amount);
  }
  return toEntries(buckets, (key) => labels.get(key) ?? key);
};

const mergePaymentModes = (a: PaymentModeEntry[], b: PaymentModeEntry[]): PaymentModeEntry[] => {
  const payers = new Map<string, BreakdownEntry[]>();
  for (const entry of [...a, ...b]) {
    payers.set(entry.key, [...(payers.get(entry.key) ?? []), ...entry.payers]);
  }
  return mergeEntries(a, b).map((entry) => ({
    ...entry,
    payers: mergeEntries(payers.get(entry.key) ?? [], []),
  }));
};

const mergeHourly = (a: HourlyEntry[], b: HourlyEntry[]): HourlyEntry[] => {
  const hours = new Map<number, Bucket>();
  for (const entry of [...a, ...b]) {
    addToHour(hours, entry.hour, entry.count, entry.amount);
  }
  return toHourly(hours);
};
