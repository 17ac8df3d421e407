import { PipelineStage, RunStatus } from '../common/enums';

export interface RunResult {
  ownerId: string;
  ownerName: string;
  email: string | null;
  status: RunStatus;
  reason?: string;
  failedStage?: PipelineStage;
  recordCount: number;
  /** Minor units */
  amount: number;
  /** Ids of the locations the report covered */
  locations: string[];
  templateUsed?: number;
  attachments: string[];
}

export interface RunCounts {
  sent: number;
  skipped: number;
  failed: number;
  total: number;
}

export interface RunSummary {
  triggerSource: string;
  reportDate: string | null;
  counts: RunCounts;
  totals: {
    records: number;
    amount: number;
  };
  results: RunResult[];
  summaryEmailSent: boolean;
}

/**
 * Request-level options for a run
 */
export interface RunRequest {
  ownerIds?: string[];
  email?: string;
  template?: number;
  timezone?: string;
  locationIds?: string[];
  date?: string;
  source?: string;
}
