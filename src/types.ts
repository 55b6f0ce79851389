export type Platform = 'workday' | 'oracle' | 'custom';

export type ScrapeRunStatus = 'running' | 'completed' | 'failed';

export interface CompanyRecord {
  company_name: string;
  careers_url: string;
  platform: Platform;
  active: boolean;
}

/** Calendar date as `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface ExtractedJobFields {
  readonly responsibilities?: string;
  readonly minEducation?: string;
  readonly minExperience?: string;
  readonly preferredQualifications?: string;
  readonly salaryRange?: string;
  readonly jobIdentification?: string;
  readonly jobCategory?: string;
  readonly degreeLevel?: string;
  readonly eclGtcRequired?: string;
}

export interface JobListing {
  title: string;
  url: string;
  location?: string;
  postingDate?: CalendarDate;
  /** Platform-side handle used to fetch the detail payload. */
  detailKey?: string;
}

export interface ScrapedJob extends ExtractedJobFields {
  readonly title: string;
  readonly url: string;
  readonly location?: string;
  readonly postingDate?: CalendarDate;
}

export interface FetchResult {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
  contentType: string;
}
