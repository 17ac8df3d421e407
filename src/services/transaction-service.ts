import { z } from 'zod';
import { ReportConfig, loadReportConfig } from '../config/report';
import { TransactionRepository } from '../repositories/transaction-repository';
import { DayWindow } from '../types/models/calendar';
import {
  EnrichedRecord,
  FetchOptions,
  OwnerInfo,
  TransactionRecord,
  VehicleInfo,
} from '../types/models/transaction';
import {
  CustomerRow,
  TransactionRow,
  VehicleRow,
  customerRowSchema,
  nullableTextSchema,
  transactionRowSchema,
  vehicleRowSchema,
} from '../types/schemas/records';
import { IRecordFetcher } from '../types/services/record-fetcher';
import { IRecordStore, StoreRow } from '../types/services/record-store';
import { toMinorUnits } from '../utils/money';
import { FetchError, describeError } from '../utils/errors/report-errors';

export type FetcherConfig = Pick<
  ReportConfig,
  'amountColumns' | 'tables' | 'vehicleDetailColumn' | 'vehicleModelColumn'
>;

/**
 * Reads the amount from the first populated candidate column, in order.
 * Rows with none of them count as zero.
 */
export const resolveAmount = (row: StoreRow, columns: readonly string[]): number => {
  for (const column of columns) {
    const minor = toMinorUnits(row[column]);
    if (minor !== null) {
      return minor;
    }
  }
  return 0;
};

const distinct = (values: (string | null)[]): string[] =>
  Array.from(new Set(values.filter((value): value is string => value !== null)));

const readText = (row: StoreRow, column: string): string | null => {
  const parsed = nullableTextSchema.safeParse(row[column]);
  return parsed.success ? parsed.data : null;
};

/**
 * Fetches the approved transactions of a day with their customer and vehicle
 * details joined on. Reference data is loaded in batches: one lookup per
 * reference table, independent of the number of records.
 */
export class TransactionService implements IRecordFetcher {
  constructor(
    private readonly store: IRecordStore,
    private readonly config: FetcherConfig,
  ) {}

  /**
   * Creates and initializes a new instance of TransactionService
   */
  public static async initialize(config: FetcherConfig = loadReportConfig()): Promise<TransactionService> {
    const repository = await TransactionRepository.initialize(config.tables);
    return new TransactionService(repository, config);
  }

  async fetch(
    locationIds: readonly string[],
    window: DayWindow,
    options: FetchOptions = {},
  ): Promise<EnrichedRecord[]> {
    if (locationIds.length === 0) {
      return [];
    }

    const rawRows = await this.guard('transactions', () =>
      this.store.findApproved({
        locationIds: [...locationIds],
        start: window.start,
        end: window.end,
        customerId: options.customerId,
      }),
    );

    if (rawRows.length === 0) {
      return [];
    }

    const rows = rawRows.map((raw) => ({ raw, row: this.parse(transactionRowSchema, raw) }));

    const [customers, vehicles] = await Promise.all([
      this.loadCustomers(distinct(rows.map(({ row }) => row.cust_id))),
      this.loadVehicles(distinct(rows.map(({ row }) => row.vehicle_id))),
    ]);
    const models = await this.loadModels(Array.from(vehicles.values()));

    return rows.map(({ raw, row }) => {
      const vehicle = row.vehicle_id ? vehicles.get(row.vehicle_id) : undefined;
      return {
        record: this.toRecord(row, raw),
        owner: this.toOwner(row, row.cust_id ? customers.get(row.cust_id) : undefined),
        vehicle: this.toVehicle(row, vehicle, models),
      };
    });
  }

  private toRecord(row: TransactionRow, raw: StoreRow): TransactionRecord {
    return {
      id: row.id,
      customerId: row.cust_id,
      vehicleId: row.vehicle_id,
      locationId: row.loc_id,
      createdAt: row.created_at,
      amount: resolveAmount(raw, this.config.amountColumns),
      paymentMode: row.payment_mode,
      service: row.service,
      entryType: row.entry_type,
      payerName: row.upi_account_name,
    };
  }

  private toOwner(row: TransactionRow, customer: CustomerRow | undefined): OwnerInfo {
    const fullName = customer
      ? [customer.first_name, customer.last_name].filter(Boolean).join(' ') || customer.name
      : null;
    return {
      name: fullName || row.Name,
      contact: customer?.phone ?? row.Phone_no,
    };
  }

  private toVehicle(
    row: TransactionRow,
    vehicle: { row: VehicleRow; detailId: string | null } | undefined,
    models: Map<string, string>,
  ): VehicleInfo {
    const detailId = vehicle?.detailId ?? null;
    return {
      plate: vehicle?.row.number_plate ?? row.vehicle_number,
      type: vehicle?.row.vehicle_type ?? row.vehicle_type,
      model: detailId !== null ? models.get(detailId) ?? null : null,
    };
  }

  private async loadCustomers(ids: string[]): Promise<Map<string, CustomerRow>> {
    if (ids.length === 0) {
      return new Map();
    }
    const rows = await this.guard('customers', () =>
      this.store.findByIds(this.config.tables.customers, ids),
    );
    return new Map(
      rows.map((raw): [string, CustomerRow] => {
        const customer = this.parse(customerRowSchema, raw);
        return [customer.id, customer];
      }),
    );
  }

  private async loadVehicles(
    ids: string[],
  ): Promise<Map<string, { row: VehicleRow; detailId: string | null }>> {
    if (ids.length === 0) {
      return new Map();
    }
    const rows = await this.guard('vehicles', () =>
      this.store.findByIds(this.config.tables.vehicles, ids),
    );
    return new Map(
      rows.map((raw): [string, { row: VehicleRow; detailId: string | null }] => {
        const vehicle = this.parse(vehicleRowSchema, raw);
        return [vehicle.id, { row: vehicle, detailId: readText(raw, this.config.vehicleDetailColumn) }];
      }),
    );
  }

  /**
   * Second stage of the vehicle join: detail id -> model name
   */
  private async loadModels(
    vehicles: { detailId: string | null }[],
  ): Promise<Map<string, string>> {
    const detailIds = distinct(vehicles.map((vehicle) => vehicle.detailId));
    if (detailIds.length === 0) {
      return new Map();
    }
    const rows = await this.guard('vehicle details', () =>
      this.store.findByIds(this.config.tables.vehicleDetails, detailIds),
    );

    const models = new Map<string, string>();
    for (const raw of rows) {
      const id = readText(raw, 'id');
      const model = readText(raw, this.config.vehicleModelColumn);
      if (id !== null && model !== null) {
        models.set(id, model);
      }
    }
    return models;
  }

  private parse<S extends z.ZodTypeAny>(schema: S, raw: StoreRow): z.infer<S> {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new FetchError(`Malformed row: ${result.error.message}`, result.error);
    }
    return result.data;
  }

  private async guard<T>(what: string, load: () => Promise<T>): Promise<T> {
    try {
      return await load();
    } catch (error) {
      console.error(`Error fetching ${what}:`, error);
      throw new FetchError(`Failed to fetch ${what}: ${describeError(error)}`, error);
    }
  }
}
