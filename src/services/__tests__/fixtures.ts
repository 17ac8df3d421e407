import { resolveDayWindow } from '../calendar-service';
import { LocationRef } from '../../types/models/location';
import { EnrichedRecord, OwnerInfo, TransactionRecord, VehicleInfo } from '../../types/models/transaction';

export const WINDOW = resolveDayWindow('2024-05-01', '+05:30');

export const MG_ROAD: LocationRef = { id: 'L1', name: 'MG Road' };
export const INDIRANAGAR: LocationRef = { id: 'L2', name: 'Indiranagar' };

let sequence = 0;

interface RecordOverrides extends Partial<TransactionRecord> {
  owner?: Partial<OwnerInfo>;
  vehicle?: Partial<VehicleInfo>;
}

/**
 * Enriched record at 10:00 IST on 2024-05-01 unless overridden
 */
export const makeRecord = ({ owner, vehicle, ...record }: RecordOverrides = {}): EnrichedRecord => {
  sequence += 1;
  return {
    record: {
      id: `T${sequence}`,
      customerId: 'C1',
      vehicleId: 'V1',
      locationId: MG_ROAD.id,
      createdAt: new Date('2024-05-01T04:30:00.000Z'),
      amount: 10000,
      paymentMode: 'cash',
      service: 'Wash',
      entryType: 'manual',
      payerName: null,
      ...record,
    },
    owner: { name: 'Asha Rao', contact: '98450', ...owner },
    vehicle: { plate: 'KA05', type: 'Hatchback', model: 'Swift', ...vehicle },
  };
};
