import { z } from 'zod';
import { PipelineStage, RunStatus } from '../common/enums';

export const runResultSchema = z.object({
  ownerId: z.string(),
  ownerName: z.string(),
  email: z.string().nullable(),
  status: z.nativeEnum(RunStatus),
  reason: z.string().optional(),
  failedStage: z.nativeEnum(PipelineStage).optional(),
  recordCount: z.number().int(),
  amount: z.number().int(),
  locations: z.array(z.string()),
  templateUsed: z.number().int().optional(),
  attachments: z.array(z.string()),
});

export const sendReportsResponseSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    triggerSource: z.string(),
    reportDate: z.string().nullable(),
    counts: z.object({
      sent: z.number().int(),
      skipped: z.number().int(),
      failed: z.number().int(),
      total: z.number().int(),
    }),
    totals: z.object({
      records: z.number().int(),
      amount: z.number().int(),
    }),
    results: z.array(runResultSchema),
    summaryEmailSent: z.boolean(),
  }),
});

export const healthResponseSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    service: z.string(),
    database: z.literal('up'),
    emailProvider: z.enum(['ses', 'smtp']),
    timestamp: z.string(),
  }),
});

export const errorResponseSchema = z.object({
  status: z.literal('error'),
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});
