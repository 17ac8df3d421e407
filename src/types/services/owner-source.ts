import { OwnerFilter, OwnerSchedule } from '../models/owner';

/**
 * Supplies the owners a run should report to
 */
export interface IOwnerSource {
  listOwners(filter?: OwnerFilter): Promise<OwnerSchedule[]>;
}
