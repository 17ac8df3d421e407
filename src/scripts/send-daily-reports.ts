import { parseArgs } from 'node:util';
import { DatabaseService } from '../config/database';
import { ReportRunService } from '../services/report-run-service';
import { sendReportsBodySchema } from '../types/schemas/handlers';
import { handleZodError } from '../middleware/zod-error-handler';

const list = (value: string | undefined): string[] | undefined =>
  value ? value.split(',').map((item) => item.trim()).filter(Boolean) : undefined;

/**
 * Runs the daily reports once from the command line, e.g.
 *   send-daily-reports --date 2024-05-01 --owners 12,15 --template 2
 */
async function main() {
  const { values } = parseArgs({
    options: {
      date: { type: 'string' },
      owners: { type: 'string' },
      locations: { type: 'string' },
      email: { type: 'string' },
      template: { type: 'string' },
      timezone: { type: 'string' },
    },
  });

  const parsed = sendReportsBodySchema.safeParse({
    date: values.date,
    ownerIds: list(values.owners),
    locationIds: list(values.locations),
    email: values.email,
    template: values.template ? Number(values.template) : undefined,
    timezone: values.timezone,
    source: 'cli',
  });

  if (!parsed.success) {
    throw handleZodError(parsed.error, 'args');
  }

  const service = await ReportRunService.initialize();
  const database = await DatabaseService.getInstance();
  const summary = await service.run(parsed.data).finally(() => database.close());
  console.log('Daily report run completed', JSON.stringify(summary.counts));
  process.exit(summary.counts.failed > 0 ? 1 : 0);
}

main().catch((error) => {
  console.error('Error in daily report run:', error);
  process.exit(1);
});
