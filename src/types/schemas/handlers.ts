import { z } from 'zod';
import { isValidReportDate } from '../../services/calendar-service';

// Common schemas
export const apiKeySchema = z.string({
  required_error: 'API key is required',
  invalid_type_error: 'API key must be a string',
});

const idListSchema = z
  .array(z.union([z.string().min(1), z.number().int()]).transform(String))
  .min(1, 'At least one id is required');

// Send Reports Handler schemas
export const sendReportsBodySchema = z.object({
  ownerIds: idListSchema.optional(),
  email: z.string().email('Email must be a valid address').optional(),
  template: z
    .number({ invalid_type_error: 'Template must be a number' })
    .int('Template must be an integer')
    .min(1, 'Template must be 1, 2 or 3')
    .max(3, 'Template must be 1, 2 or 3')
    .optional(),
  timezone: z.string().trim().min(1, 'Timezone cannot be empty').optional(),
  locationIds: idListSchema.optional(),
  date: z
    .string()
    .refine(isValidReportDate, 'Date must be a valid YYYY-MM-DD date')
    .optional(),
  source: z.string().trim().min(1).max(64).optional(),
});

export type SendReportsBody = z.infer<typeof sendReportsBodySchema>;
