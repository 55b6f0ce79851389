import type { Platform, ScrapeRunStatus } from '../types.js';

export interface QuarterLabel {
  quarter: number;
  year: number;
  /** `Q{n}_{year}` */
  label: string;
}

export interface CompanyRunResult {
  companyName: string;
  platform: Platform;
  runId?: number;
  status: Exclude<ScrapeRunStatus, 'running'> | 'skipped';
  jobsFound: number;
  jobsNew: number;
  jobsUpdated: number;
  errorMessage?: string;
  exportPath?: string;
}

export interface QuarterlyRunSummary {
  quarter: QuarterLabel;
  startedAt: string;
  finishedAt: string;
  durationMinutes: number;
  companies: CompanyRunResult[];
  totalJobs: number;
  combinedExportPath?: string;
}

export interface QuarterlyRunOptions {
  /** Company name, or `all` for every active company. */
  target: string;
  fetchDetails: boolean;
  maxPages?: number;
}
