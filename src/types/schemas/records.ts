import { z } from 'zod';

const idSchema = z.union([z.string(), z.number(), z.bigint()]).transform(String);

const nullableIdSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

export const nullableTextSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  });

const timestampSchema = z
  .union([z.date(), z.string()])
  .transform((value) => (value instanceof Date ? value : new Date(value)))
  .refine((value) => !Number.isNaN(value.getTime()), { message: 'Invalid timestamp' });

/**
 * Row of the transaction log table. Customer and vehicle columns are the
 * legacy inline copies kept on older rows.
 */
export const transactionRowSchema = z.object({
  id: idSchema,
  cust_id: nullableIdSchema,
  vehicle_id: nullableIdSchema,
  loc_id: idSchema,
  created_at: timestampSchema,
  payment_mode: nullableTextSchema,
  service: nullableTextSchema,
  entry_type: nullableTextSchema,
  upi_account_name: nullableTextSchema,
  Name: nullableTextSchema,
  Phone_no: nullableTextSchema,
  vehicle_number: nullableTextSchema,
  vehicle_type: nullableTextSchema,
});

export const customerRowSchema = z.object({
  id: idSchema,
  name: nullableTextSchema,
  first_name: nullableTextSchema,
  last_name: nullableTextSchema,
  phone: nullableTextSchema,
});

export const vehicleRowSchema = z.object({
  id: idSchema,
  number_plate: nullableTextSchema,
  vehicle_type: nullableTextSchema,
});

export const ownerRowSchema = z.object({
  id: idSchema,
  email: nullableTextSchema,
  first_name: nullableTextSchema,
  last_name: nullableTextSchema,
  name: nullableTextSchema,
  templateno: z.union([z.number(), z.string()]).nullish().transform((value) => {
    if (value === null || value === undefined || value === '') {
      return null;
    }
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : null;
  }),
  timezone: nullableTextSchema,
  assigned_location: nullableIdSchema,
});

export const locationRowSchema = z.object({
  id: idSchema,
  name: nullableTextSchema,
  owner_id: nullableIdSchema,
});

export type TransactionRow = z.infer<typeof transactionRowSchema>;
export type CustomerRow = z.infer<typeof customerRowSchema>;
export type VehicleRow = z.infer<typeof vehicleRowSchema>;
export type OwnerRow = z.infer<typeof ownerRowSchema>;
export type LocationRow = z.infer<typeof locationRowSchema>;
