import dotenv from 'dotenv';

dotenv.config();

export interface ReportTables {
  transactions: string;
  customers: string;
  vehicles: string;
  vehicleDetails: string;
  users: string;
  locations: string;
}

/**
 * Settings for report generation and delivery
 */
export interface ReportConfig {
  /** Regional offset used when neither the request nor the owner sets one */
  defaultTimezone: string;
  /** Legacy amount columns, in precedence order */
  amountColumns: string[];
  tables: ReportTables;
  /** Column on the vehicles table linking to the vehicle detail table */
  vehicleDetailColumn: string;
  /** Column on the vehicle detail table holding the model name */
  vehicleModelColumn: string;
  /** Owners processed at the same time */
  concurrency: number;
  sender: string;
  /** When set, every report goes to this address instead of the owner */
  testEmail: string | null;
  /** Receives the run summary after each run */
  adminSummaryEmail: string | null;
  currencySymbol: string;
}

const parseList = (value: string | undefined, fallback: string[]): string[] => {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const optional = (value: string | undefined): string | null =>
  value && value.trim().length > 0 ? value.trim() : null;

export const DEFAULT_AMOUNT_COLUMNS = ['Amount', 'amount', 'price', 'total_amount'];

/**
 * Builds the report configuration from environment variables
 */
export const loadReportConfig = (env: NodeJS.ProcessEnv = process.env): ReportConfig => ({
  defaultTimezone: env.DEFAULT_TIMEZONE || '+05:30',
  amountColumns: parseList(env.AMOUNT_COLUMNS, DEFAULT_AMOUNT_COLUMNS),
  tables: {
    transactions: env.TRANSACTIONS_TABLE || 'logs-man',
    customers: env.CUSTOMERS_TABLE || 'customers',
    vehicles: env.VEHICLES_TABLE || 'vehicles',
    vehicleDetails: env.VEHICLE_DETAILS_TABLE || 'vehicle_details',
    users: env.USERS_TABLE || 'users',
    locations: env.LOCATIONS_TABLE || 'locations',
  },
  vehicleDetailColumn: env.VEHICLE_DETAIL_COLUMN || 'veh_det',
  vehicleModelColumn: env.VEHICLE_MODEL_COLUMN || 'model',
  concurrency: parsePositiveInt(env.REPORT_CONCURRENCY, 5),
  sender: env.EMAIL_SENDER || 'reports@localhost',
  testEmail: optional(env.TEST_EMAIL),
  adminSummaryEmail: optional(env.ADMIN_SUMMARY_EMAIL),
  currencySymbol: env.CURRENCY_SYMBOL || '₹',
});
