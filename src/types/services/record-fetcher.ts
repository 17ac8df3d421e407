import { DayWindow } from '../models/calendar';
import { EnrichedRecord, FetchOptions } from '../models/transaction';

export interface IRecordFetcher {
  fetch(locationIds: readonly string[], window: DayWindow, options?: FetchOptions): Promise<EnrichedRecord[]>;
}
