import { join } from 'node:path';
import type { ExportJobRow } from '../db/sqlite.js';
import { writeCsv } from '../utils/csv.js';
import { safeFilename } from '../utils/text.js';

export const EXPORT_COLUMNS = [
  'company_name',
  'job_title',
  'location',
  'job_responsibilities',
  'min_education',
  'min_experience',
  'preferred_qualifications',
  'salary_range',
  'job_identification',
  'job_category',
  'degree_level',
  'ecl_gtc_required',
  'posting_date',
  'job_url',
] as const satisfies ReadonlyArray<keyof ExportJobRow>;

export const COMBINED_EXPORT_NAME = 'ALL_COMPANIES';

/** `YYYYMMDD` in local time. */
export function compactDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}${month}${day}`;
}

/** `jobs_{safe_company}_{YYYYMMDD}.csv` */
export function exportFileName(companyName: string, date: Date = new Date()): string {
  return `jobs_${safeFilename(companyName)}_${compactDate(date)}.csv`;
}

/** Writes the rows and returns the file path, or `null` when there is nothing to write. */
export async function writeJobsCsv(
  exportDir: string,
  companyName: string,
  rows: ExportJobRow[],
  date: Date = new Date(),
): Promise<string | null> {
  if (rows.length === 0) {
    return null;
  }

  const filePath = join(exportDir, exportFileName(companyName, date));
  await writeCsv(
    filePath,
    EXPORT_COLUMNS,
    rows.map((row) => EXPORT_COLUMNS.map((column) => row[column])),
  );
  return filePath;
}
