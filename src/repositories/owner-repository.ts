import { DatabaseService } from '../config/database';
import { ReportTables, loadReportConfig } from '../config/report';
import { LocationRef } from '../types/models/location';
import { OwnerFilter, OwnerSchedule } from '../types/models/owner';
import { IOwnerSource } from '../types/services/owner-source';
import {
  LocationRow,
  OwnerRow,
  locationRowSchema,
  ownerRowSchema,
} from '../types/schemas/records';
import { quoteIdentifier } from './transaction-repository';

/**
 * Display name for an owner: first/last name, then name, then email, then id
 */
export const ownerDisplayName = (owner: OwnerRow): string => {
  const full = [owner.first_name, owner.last_name].filter(Boolean).join(' ');
  return full || owner.name || owner.email || owner.id;
};

/**
 * Repository for report owners and the locations they receive reports for
 */
export class OwnerRepository implements IOwnerSource {
  constructor(
    private readonly db: DatabaseService,
    private readonly tables: ReportTables,
  ) {}

  public static async initialize(
    tables: ReportTables = loadReportConfig().tables,
  ): Promise<OwnerRepository> {
    const dbService = await DatabaseService.getInstance();
    return new OwnerRepository(dbService, tables);
  }

  /**
   * Lists owners (optionally a subset) with their preferences and locations.
   * Locations come from `locations.owner_id` plus the legacy
   * `users.assigned_location` column.
   */
  async listOwners(filter?: OwnerFilter): Promise<OwnerSchedule[]> {
    const params: unknown[] = ['owner'];
    let text =
      'SELECT id, email, first_name, last_name, name, templateno, timezone, assigned_location ' +
      `FROM ${quoteIdentifier(this.tables.users)} WHERE role = $1`;

    if (filter?.ownerIds && filter.ownerIds.length > 0) {
      params.push(filter.ownerIds);
      text += ` AND id = ANY($${params.length})`;
    }
    text += ' ORDER BY id ASC';

    const ownerResult = await this.db.query(text, params);
    const owners = ownerResult.rows.map((row) => ownerRowSchema.parse(row));

    if (owners.length === 0) {
      return [];
    }

    const ownerIds = owners.map((owner) => owner.id);
    const assignedIds = owners
      .map((owner) => owner.assigned_location)
      .filter((id): id is string => id !== null);

    const locationResult = await this.db.query(
      `SELECT id, name, owner_id FROM ${quoteIdentifier(this.tables.locations)} ` +
        'WHERE owner_id = ANY($1) OR id = ANY($2) ORDER BY name ASC, id ASC',
      [ownerIds, assignedIds],
    );
    const locations = locationResult.rows.map((row) => locationRowSchema.parse(row));

    return owners.map((owner) => ({
      ownerId: owner.id,
      name: ownerDisplayName(owner),
      email: owner.email,
      templateSelector: owner.templateno,
      timezone: owner.timezone,
      locations: this.locationsFor(owner, locations),
    }));
  }

  private locationsFor(owner: OwnerRow, locations: LocationRow[]): LocationRef[] {
    const owned = locations.filter(
      (location) => location.owner_id === owner.id || location.id === owner.assigned_location,
    );
    return owned.map((location) => ({ id: location.id, name: location.name ?? location.id }));
  }
}
