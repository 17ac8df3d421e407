import { DayWindow } from '../models/calendar';
import { LocationRef } from '../models/location';
import { ConsolidatedSummary, LocationSummary, ReportAggregate } from '../models/report';
import { EnrichedRecord } from '../models/transaction';

export interface IReportService {
  aggregate(records: readonly EnrichedRecord[], window: DayWindow): ReportAggregate;
  summarizeLocation(location: LocationRef, records: readonly EnrichedRecord[], window: DayWindow): LocationSummary;
  consolidate(summaries: readonly LocationSummary[]): ConsolidatedSummary;
}
