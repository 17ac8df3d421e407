import { DayWindow } from './calendar';
import { LocationRef } from './location';

/**
 * Owner row as supplied by the owner schedule source
 */
export interface OwnerSchedule {
  ownerId: string;
  name: string;
  email: string | null;
  templateSelector: number | null;
  timezone: string | null;
  locations: LocationRef[];
}

export interface OwnerFilter {
  ownerIds?: string[];
}

/**
 * Resolved, immutable input for one owner's report
 */
export interface OwnerRunContext {
  readonly ownerId: string;
  readonly ownerName: string;
  readonly email: string;
  readonly templateSelector: number;
  readonly timezone: string;
  readonly window: DayWindow;
  readonly locations: readonly LocationRef[];
}
