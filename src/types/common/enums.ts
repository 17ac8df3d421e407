/**
 * Approval states of a transaction log
 */
export enum ApprovalStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected'
}

/**
 * Terminal outcome of one owner's report in a run
 */
export enum RunStatus {
  SENT = 'sent',
  SKIPPED = 'skipped',
  FAILED = 'failed'
}

/**
 * Stages an owner moves through while its report is produced
 */
export enum PipelineStage {
  PENDING = 'pending',
  FETCHING = 'fetching',
  AGGREGATING = 'aggregating',
  RENDERING = 'rendering',
  COMPOSING = 'composing',
  SENDING = 'sending'
}

/**
 * Available email layouts
 */
export enum TemplateSelector {
  CLASSIC = 1,
  ENHANCED = 2,
  INSIGHTS = 3
}

export enum SkipReason {
  NO_RECIPIENT = 'no recipient',
  NO_DATA = 'no data'
}
