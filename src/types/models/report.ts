import { LocationRef } from './location';
import { EnrichedRecord } from './transaction';

/**
 * One group of a breakdown dimension. Amounts are minor units.
 */
export interface BreakdownEntry {
  key: string;
  label: string;
  count: number;
  amount: number;
}

export interface PaymentModeEntry extends BreakdownEntry {
  /** Per payer-account detail inside this payment mode */
  payers: BreakdownEntry[];
}

export interface HourlyEntry {
  /** Hour of day in the report's regional offset */
  hour: number;
  label: string;
  count: number;
  amount: number;
}

export interface ReportAggregate {
  totalAmount: number;
  count: number;
  averageAmount: number;
  paymentModes: PaymentModeEntry[];
  services: BreakdownEntry[];
  vehicleTypes: BreakdownEntry[];
  hourly: HourlyEntry[];
  rows: EnrichedRecord[];
}

export interface LocationSummary extends ReportAggregate {
  location: LocationRef;
}

export interface ConsolidatedSummary extends ReportAggregate {
  locations: LocationSummary[];
}

export type ReportSummary = LocationSummary | ConsolidatedSummary;

export const isConsolidated = (summary: ReportSummary): summary is ConsolidatedSummary =>
  'locations' in summary;
