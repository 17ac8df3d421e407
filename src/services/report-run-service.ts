import { ReportConfig, loadReportConfig } from '../config/report';
import { EmailRepository } from '../repositories/email-repository';
import { OwnerRepository } from '../repositories/owner-repository';
import { PipelineStage, RunStatus, SkipReason } from '../types/common/enums';
import { OwnerRunContext, OwnerSchedule } from '../types/models/owner';
import { ReportSummary } from '../types/models/report';
import { RunRequest, RunResult, RunSummary } from '../types/models/run';
import { EnrichedRecord } from '../types/models/transaction';
import { IEmailTransport } from '../types/services/email-transport';
import { IOwnerSource } from '../types/services/owner-source';
import { IRecordFetcher } from '../types/services/record-fetcher';
import { IReportService } from '../types/services/report-service';
import { describeError } from '../utils/errors/report-errors';
import { Result, attempt, err, ok } from '../utils/result';
import { AttachmentService } from './attachment-service';
import { resolveDayWindow, todayIn } from './calendar-service';
import { EmailService } from './email-service';
import { ReportService } from './report-service';
import { createTemplate, resolveTemplateSelector } from './templates';
import { renderRunSummary } from './templates/run-summary-template';
import { TransactionService } from './transaction-service';

export interface ReportRunDependencies {
  owners: IOwnerSource;
  fetcher: IRecordFetcher;
  transport: IEmailTransport;
  reports: IReportService;
  attachments: AttachmentService;
  composer: EmailService;
  config: ReportConfig;
  now?: () => Date;
}

interface StageFailure {
  stage: PipelineStage;
  error: unknown;
}

const pickText = (...values: (string | null | undefined)[]): string | undefined =>
  values.find((value): value is string => typeof value === 'string' && value.trim().length > 0);

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

/**
 * Folds per-owner results into run totals, keeping owner order
 */
export const summarizeRun = (
  results: RunResult[],
  triggerSource: string,
  reportDate: string | null,
): Omit<RunSummary, 'summaryEmailSent'> => ({
  triggerSource,
  reportDate,
  counts: {
    sent: results.filter((result) => result.status === RunStatus.SENT).length,
    skipped: results.filter((result) => result.status === RunStatus.SKIPPED).length,
    failed: results.filter((result) => result.status === RunStatus.FAILED).length,
    total: results.length,
  },
  totals: {
    records: results.reduce((sum, result) => sum + result.recordCount, 0),
    amount: results.reduce((sum, result) => sum + result.amount, 0),
  },
  results,
});

/**
 * Runs the daily report for every owner: resolve the day, fetch, aggregate,
 * render, compose and send. One owner's failure never affects another.
 */
export class ReportRunService {
  private readonly now: () => Date;

  constructor(private readonly deps: ReportRunDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Creates and initializes a new instance of ReportRunService
   */
  public static async initialize(config: ReportConfig = loadReportConfig()): Promise<ReportRunService> {
    const [owners, fetcher, transport] = await Promise.all([
      OwnerRepository.initialize(config.tables),
      TransactionService.initialize(config),
      EmailRepository.initialize(),
    ]);

    return new ReportRunService({
      owners,
      fetcher,
      transport,
      reports: new ReportService(),
      attachments: new AttachmentService(),
      composer: new EmailService(),
      config,
    });
  }

  /**
   * Executes one run. Only shared setup (owner lookup, transport check) can
   * reject; everything per owner ends up in the summary.
   */
  async run(request: RunRequest = {}): Promise<RunSummary> {
    const triggerSource = request.source ?? 'manual';
    const { concurrency } = this.deps.config;

    console.log('Starting daily report run', {
      triggerSource,
      date: request.date ?? null,
      ownerIds: request.ownerIds ?? null,
    });

    const owners = await this.deps.owners.listOwners(
      request.ownerIds ? { ownerIds: request.ownerIds } : undefined,
    );
    await this.deps.transport.verifyConnection();

    console.log(`Found ${owners.length} owners to process`);

    const results: RunResult[] = [];
    for (const batch of chunk(owners, concurrency)) {
      results.push(...(await Promise.all(batch.map((owner) => this.processOwner(owner, request)))));
    }

    const folded = summarizeRun(results, triggerSource, this.runDate(request));
    const summaryEmailSent = await this.sendRunSummary({ ...folded, summaryEmailSent: false });

    console.log('Daily report run completed', { ...folded.counts, summaryEmailSent });

    return { ...folded, summaryEmailSent };
  }

  /**
   * Carries one owner through every stage and reports where it stopped
   */
  async processOwner(owner: OwnerSchedule, request: RunRequest = {}): Promise<RunResult> {
    const recipient = pickText(request.email, this.deps.config.testEmail, owner.email) ?? null;
    const base: RunResult = {
      ownerId: owner.ownerId,
      ownerName: owner.name,
      email: recipient,
      status: RunStatus.SKIPPED,
      recordCount: 0,
      amount: 0,
      locations: [],
      attachments: [],
    };

    if (recipient === null) {
      console.log(`Skipping owner ${owner.ownerId}: no recipient`);
      return { ...base, reason: SkipReason.NO_RECIPIENT };
    }

    const built = await this.stage(PipelineStage.PENDING, () => this.buildContext(owner, recipient, request));
    if (!built.ok) {
      return this.failed(base, built.error);
    }
    const context = built.value;
    const withContext: RunResult = {
      ...base,
      locations: context.locations.map((location) => location.id),
      templateUsed: context.templateSelector,
    };

    if (context.locations.length === 0) {
      return { ...withContext, reason: SkipReason.NO_DATA };
    }

    const fetched = await this.stage(PipelineStage.FETCHING, () =>
      this.deps.fetcher.fetch(
        context.locations.map((location) => location.id),
        context.window,
      ),
    );
    if (!fetched.ok) {
      return this.failed(withContext, fetched.error);
    }
    if (fetched.value.length === 0) {
      console.log(`Skipping owner ${owner.ownerId}: no approved records on ${context.window.date}`);
      return { ...withContext, reason: SkipReason.NO_DATA };
    }

    const aggregated = await this.stage(PipelineStage.AGGREGATING, () =>
      this.summarize(context, fetched.value),
    );
    if (!aggregated.ok) {
      return this.failed(withContext, aggregated.error);
    }
    const summary = aggregated.value;
    const withTotals: RunResult = {
      ...withContext,
      recordCount: summary.count,
      amount: summary.totalAmount,
    };

    const rendered = await this.stage(PipelineStage.RENDERING, () => ({
      report: createTemplate(context.templateSelector).render({
        summary,
        window: context.window,
        currencySymbol: this.deps.config.currencySymbol,
      }),
      attachments: this.deps.attachments.build(summary, context.window),
    }));
    if (!rendered.ok) {
      return this.failed(withTotals, rendered.error);
    }

    const composed = await this.stage(PipelineStage.COMPOSING, () =>
      this.deps.composer.compose({
        report: rendered.value.report,
        attachments: rendered.value.attachments,
        recipient: context.email,
        from: this.deps.config.sender,
      }),
    );
    if (!composed.ok) {
      return this.failed(withTotals, composed.error);
    }

    const sent = await this.stage(PipelineStage.SENDING, () => this.deps.transport.send(composed.value));
    if (!sent.ok) {
      return this.failed(withTotals, sent.error);
    }

    console.log('Report sent', {
      ownerId: context.ownerId,
      recipient: context.email,
      records: summary.count,
      template: context.templateSelector,
    });

    return {
      ...withTotals,
      status: RunStatus.SENT,
      attachments: composed.value.attachmentNames,
    };
  }

  /**
   * Resolves the per-owner inputs once; nothing downstream can change them
   */
  buildContext(owner: OwnerSchedule, recipient: string, request: RunRequest = {}): OwnerRunContext {
    const { defaultTimezone } = this.deps.config;
    const timezone = pickText(request.timezone, owner.timezone, defaultTimezone) ?? defaultTimezone;
    const date = request.date ?? todayIn(timezone, this.now(), defaultTimezone);
    const locations = request.locationIds
      ? owner.locations.filter((location) => request.locationIds?.includes(location.id))
      : owner.locations;

    return Object.freeze({
      ownerId: owner.ownerId,
      ownerName: owner.name,
      email: recipient,
      templateSelector: resolveTemplateSelector(request.template, owner.templateSelector),
      timezone,
      window: resolveDayWindow(date, timezone, defaultTimezone),
      locations: Object.freeze([...locations]),
    });
  }

  /**
   * One location yields its own summary; several are consolidated
   */
  private summarize(context: OwnerRunContext, records: EnrichedRecord[]): ReportSummary {
    const summaries = context.locations.map((location) =>
      this.deps.reports.summarizeLocation(
        location,
        records.filter((row) => row.record.locationId === location.id),
        context.window,
      ),
    );
    return summaries.length === 1 ? summaries[0] : this.deps.reports.consolidate(summaries);
  }

  private async stage<T>(
    stage: PipelineStage,
    step: () => Promise<T> | T,
  ): Promise<Result<T, StageFailure>> {
    const outcome = await attempt(step);
    return outcome.ok ? ok(outcome.value) : err({ stage, error: outcome.error });
  }

  private failed(result: RunResult, { stage, error }: StageFailure): RunResult {
    const reason = `${stage}: ${describeError(error)}`;
    console.error(`Report failed for owner ${result.ownerId}`, { stage, error: describeError(error) });
    return { ...result, status: RunStatus.FAILED, reason, failedStage: stage };
  }

  private runDate(request: RunRequest): string | null {
    if (request.date) {
      return request.date;
    }
    const { defaultTimezone } = this.deps.config;
    try {
      return todayIn(pickText(request.timezone), this.now(), defaultTimezone);
    } catch (error) {
      console.warn('Could not resolve the run date', { error: describeError(error) });
      return null;
    }
  }

  /**
   * Mails the run summary to the admin address when one is configured.
   * Never throws; a failure is logged and reported as false.
   */
  private async sendRunSummary(summary: RunSummary): Promise<boolean> {
    const { adminSummaryEmail, sender, currencySymbol } = this.deps.config;
    if (!adminSummaryEmail) {
      return false;
    }

    const delivered = await attempt(async () => {
      const message = this.deps.composer.compose({
        report: renderRunSummary(summary, currencySymbol),
        attachments: [],
        recipient: adminSummaryEmail,
        from: sender,
      });
      await this.deps.transport.send(message);
    });

    if (!delivered.ok) {
      console.error('Failed to send run summary email', { error: describeError(delivered.error) });
      return false;
    }
    return true;
  }
}
