import { DatabaseService } from '../config/database';
import { ReportTables, loadReportConfig } from '../config/report';
import { ApprovalStatus } from '../types/common/enums';
import {
  ApprovedTransactionFilter,
  IRecordStore,
  StoreRow,
} from '../types/services/record-store';

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

/**
 * Repository for transaction logs and the reference tables joined onto them
 */
export class TransactionRepository implements IRecordStore {
  constructor(
    private readonly db: DatabaseService,
    private readonly tables: ReportTables,
  ) {}

  /**
   * Creates and initializes a new instance of TransactionRepository
   * @returns Promise with initialized TransactionRepository instance
   */
  public static async initialize(
    tables: ReportTables = loadReportConfig().tables,
  ): Promise<TransactionRepository> {
    const dbService = await DatabaseService.getInstance();
    return new TransactionRepository(dbService, tables);
  }

  /**
   * Finds approved transactions created in [start, end) for the given locations,
   * oldest first
   */
  async findApproved(filter: ApprovedTransactionFilter): Promise<StoreRow[]> {
    const params: unknown[] = [
      ApprovalStatus.APPROVED,
      filter.start.toISOString(),
      filter.end.toISOString(),
      filter.locationIds,
    ];

    let text =
      `SELECT * FROM ${quoteIdentifier(this.tables.transactions)} ` +
      'WHERE approval_status = $1 AND created_at >= $2 AND created_at < $3 AND loc_id = ANY($4)';

    if (filter.customerId) {
      params.push(filter.customerId);
      text += ` AND cust_id = $${params.length}`;
    }

    text += ' ORDER BY created_at ASC, id ASC';

    const result = await this.db.query<StoreRow>(text, params);
    return result.rows;
  }

  /**
   * Fetches the rows of a reference table whose id is in `ids`, in one query
   */
  async findByIds(table: string, ids: string[]): Promise<StoreRow[]> {
    if (ids.length === 0) {
      return [];
    }

    const result = await this.db.query<StoreRow>(
      `SELECT * FROM ${quoteIdentifier(table)} WHERE id = ANY($1)`,
      [ids],
    );
    return result.rows;
  }
}
