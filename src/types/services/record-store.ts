export type StoreRow = Record<string, unknown>;

export interface ApprovedTransactionFilter {
  locationIds: string[];
  start: Date;
  end: Date;
  customerId?: string;
}

/**
 * Read access to the record store used by the report pipeline
 */
export interface IRecordStore {
  findApproved(filter: ApprovedTransactionFilter): Promise<StoreRow[]>;
  findByIds(table: string, ids: string[]): Promise<StoreRow[]>;
}
