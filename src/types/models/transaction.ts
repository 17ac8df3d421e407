/**
 * One approved transaction log, as read from the record store
 */
export interface TransactionRecord {
  id: string;
  customerId: string | null;
  vehicleId: string | null;
  locationId: string;
  createdAt: Date;
  /** Amount in minor units */
  amount: number;
  paymentMode: string | null;
  service: string | null;
  entryType: string | null;
  /** Display name of the paying account (e.g. UPI handle owner) */
  payerName: string | null;
}

/**
 * Display identity of the customer who owns the serviced vehicle
 */
export interface OwnerInfo {
  name: string | null;
  contact: string | null;
}

export interface VehicleInfo {
  plate: string | null;
  type: string | null;
  /** null when the vehicle has no resolvable model reference */
  model: string | null;
}

export interface EnrichedRecord {
  record: TransactionRecord;
  owner: OwnerInfo;
  vehicle: VehicleInfo;
}

export interface FetchOptions {
  /** Restrict to a single customer */
  customerId?: string;
}
