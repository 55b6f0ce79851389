import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import initSqlJs from 'sql.js';
import type { Database, SqlValue } from 'sql.js';
import type { CalendarDate, CompanyRecord, ScrapeRunStatus, ScrapedJob } from '../types.js';
import { sanitizeText } from '../utils/text.js';

type SqlParams = Array<string | number | null>;
type SqlRow = Record<string, SqlValue>;

export interface SaveJobsResult {
  new: number;
  updated: number;
}

export interface CompleteRunInput {
  jobsFound: number;
  jobsNew: number;
  jobsUpdated: number;
  status?: Exclude<ScrapeRunStatus, 'running'>;
  errorMessage?: string;
}

export interface ExportFilter {
  companyName?: string;
  runIds?: number[];
}

export interface ExportJobRow {
  company_name: string;
  job_title: string;
  location: string | null;
  job_responsibilities: string | null;
  min_education: string | null;
  min_experience: string | null;
  preferred_qualifications: string | null;
  salary_range: string | null;
  job_identification: string | null;
  job_category: string | null;
  degree_level: string | null;
  ecl_gtc_required: string | null;
  posting_date: CalendarDate | null;
  job_url: string;
}

export interface ScrapeRunRow {
  run_id: number;
  company_name: string | null;
  jobs_found: number;
  jobs_new: number;
  jobs_updated: number;
  status: string;
  error_message: string | null;
  duration_seconds: number | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS companies (
    company_id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_name TEXT NOT NULL UNIQUE,
    careers_url TEXT NOT NULL,
    platform TEXT NOT NULL,
    active BOOLEAN DEFAULT 1,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS jobs (
    job_id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL,
    job_title TEXT NOT NULL,
    job_url TEXT UNIQUE NOT NULL,
    location TEXT,
    job_responsibilities TEXT,
    min_education TEXT,
    min_experience TEXT,
    preferred_qualifications TEXT,
    salary_range TEXT,
    job_identification TEXT,
    job_category TEXT,
    degree_level TEXT,
    ecl_gtc_required TEXT,
    posting_date DATE,
    scrape_run_id INTEGER NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (company_id) REFERENCES companies (company_id),
    FOREIGN KEY (scrape_run_id) REFERENCES scrape_runs (run_id)
  );

  CREATE TABLE IF NOT EXISTS scrape_runs (
    run_id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_date TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    company_id INTEGER,
    jobs_found INTEGER DEFAULT 0,
    jobs_new INTEGER DEFAULT 0,
    jobs_updated INTEGER DEFAULT 0,
    status TEXT DEFAULT 'running',
    error_message TEXT,
    duration_seconds INTEGER,
    FOREIGN KEY (company_id) REFERENCES companies (company_id)
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_company ON jobs(company_id);
  CREATE INDEX IF NOT EXISTS idx_jobs_location ON jobs(location);
  CREATE INDEX IF NOT EXISTS idx_jobs_posting_date ON jobs(posting_date);
  CREATE INDEX IF NOT EXISTS idx_jobs_title ON jobs(job_title);
  CREATE INDEX IF NOT EXISTS idx_scrape_runs_date ON scrape_runs(run_date);
  CREATE INDEX IF NOT EXISTS idx_scrape_runs_company ON scrape_runs(company_id);

  CREATE VIEW IF NOT EXISTS vw_jobs_full AS
  SELECT
    j.job_id,
    c.company_name,
    j.job_title,
    j.location,
    j.job_responsibilities,
    j.min_education,
    j.min_experience,
    j.preferred_qualifications,
    j.salary_range,
    j.job_identification,
    j.job_category,
    j.degree_level,
    j.ecl_gtc_required,
    j.posting_date,
    j.job_url,
    j.created_at,
    j.updated_at
  FROM jobs j
  JOIN companies c ON j.company_id = c.company_id;

  CREATE VIEW IF NOT EXISTS vw_scrape_stats AS
  SELECT
    sr.run_id,
    c.company_name,
    sr.run_date,
    sr.jobs_found,
    sr.jobs_new,
    sr.jobs_updated,
    sr.status,
    sr.duration_seconds,
    sr.error_message
  FROM scrape_runs sr
  LEFT JOIN companies c ON sr.company_id = c.company_id
  ORDER BY sr.run_date DESC;
`;

function sqlJsWasmPath(): string {
  const require = createRequire(import.meta.url);
  return join(dirname(require.resolve('sql.js')), 'sql-wasm.wasm');
}

function textOrNull(value: SqlValue | undefined): string | null {
  if (value === null || value === undefined || value instanceof Uint8Array) {
    return null;
  }
  return String(value);
}

function textOrEmpty(value: SqlValue | undefined): string {
  return textOrNull(value) ?? '';
}

function numberOr(value: SqlValue | undefined, fallback: number): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

function jobParams(job: ScrapedJob): SqlParams {
  const clean = (value: string | undefined): string | null => sanitizeText(value) ?? null;
  return [
    clean(job.title) ?? job.title,
    clean(job.location),
    clean(job.responsibilities),
    clean(job.minEducation),
    clean(job.minExperience),
    clean(job.preferredQualifications),
    clean(job.salaryRange),
    clean(job.jobIdentification),
    clean(job.jobCategory),
    clean(job.degreeLevel),
    clean(job.eclGtcRequired),
    job.postingDate ?? null,
  ];
}

export class JobsDatabase {
  private readonly runStartedAt = new Map<number, number>();

  private constructor(
    private readonly db: Database,
    private readonly filePath: string,
  ) {}

  /** Opens the database file, or starts an empty one when it does not exist yet. */
  static async open(filePath: string): Promise<JobsDatabase> {
    const wasmPath = sqlJsWasmPath();
    const sql = await initSqlJs({
      locateFile: () => wasmPath,
    });

    let existing: Uint8Array | undefined;
    try {
      existing = new Uint8Array(await readFile(filePath));
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    const database = new JobsDatabase(existing ? new sql.Database(existing) : new sql.Database(), filePath);
    database.ensureSchema();
    return database;
  }

  private ensureSchema(): void {
    this.db.run(SCHEMA);
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, Buffer.from(this.db.export()));
  }

  close(): void {
    this.db.close();
  }

  /** Inserts companies that are not in the table yet; returns how many were added. */
  syncCompanies(companies: CompanyRecord[]): number {
    let added = 0;
    for (const company of companies) {
      if (this.getCompanyId(company.company_name) !== null) {
        continue;
      }
      this.db.run(
        `
        INSERT INTO companies (company_name, careers_url, platform, active)
        VALUES (?, ?, ?, ?)
        `,
        [company.company_name, company.careers_url, company.platform, company.active ? 1 : 0],
      );
      added += 1;
    }
    return added;
  }

  getCompanyId(companyName: string): number | null {
    const row = this.firstRow('SELECT company_id FROM companies WHERE company_name = ?', [companyName]);
    return row ? numberOr(row.company_id, Number.NaN) : null;
  }

  startScrapeRun(companyName: string, startedAt: Date = new Date()): number {
    const companyId = this.getCompanyId(companyName);
    this.db.run(
      `
      INSERT INTO scrape_runs (company_id, run_date, status)
      VALUES (?, ?, 'running')
      `,
      [companyId, startedAt.toISOString()],
    );

    const runId = numberOr(this.firstRow('SELECT last_insert_rowid() AS id')?.id, Number.NaN);
    if (!Number.isFinite(runId)) {
      throw new Error(`Could not start scrape run for ${companyName}`);
    }
    this.runStartedAt.set(runId, startedAt.getTime());
    return runId;
  }

  completeScrapeRun(runId: number, input: CompleteRunInput, finishedAt: Date = new Date()): void {
    const startedAt = this.runStartedAt.get(runId);
    const durationSeconds = startedAt === undefined ? null : Math.round((finishedAt.getTime() - startedAt) / 1000);
    this.db.run(
      `
      UPDATE scrape_runs
      SET jobs_found = ?, jobs_new = ?, jobs_updated = ?,
          status = ?, error_message = ?, duration_seconds = ?
      WHERE run_id = ?
      `,
      [
        input.jobsFound,
        input.jobsNew,
        input.jobsUpdated,
        input.status ?? 'completed',
        input.errorMessage ?? null,
        durationSeconds,
        runId,
      ],
    );
    this.runStartedAt.delete(runId);
  }

  /** Inserts jobs with an unseen URL and refreshes the rest. */
  saveJobs(jobs: ScrapedJob[], companyName: string, runId: number): SaveJobsResult {
    const result: SaveJobsResult = { new: 0, updated: 0 };
    if (jobs.length === 0) {
      return result;
    }

    const companyId = this.getCompanyId(companyName);
    if (companyId === null) {
      throw new Error(`Company not found in database: ${companyName}`);
    }

    for (const job of jobs) {
      const existing = this.firstRow('SELECT job_id FROM jobs WHERE job_url = ?', [job.url]);
      const [title, ...fields] = jobParams(job);

      if (!existing) {
        this.db.run(
          `
          INSERT INTO jobs (
            company_id, job_title, job_url, location,
            job_responsibilities, min_education, min_experience,
            preferred_qualifications, salary_range, job_identification,
            job_category, degree_level, ecl_gtc_required,
            posting_date, scrape_run_id
          )
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `,
          [companyId, title, job.url, ...fields, runId],
        );
        result.new += 1;
        continue;
      }

      this.db.run(
        `
        UPDATE jobs SET
          job_title = ?, location = ?, job_responsibilities = ?,
          min_education = ?, min_experience = ?, preferred_qualifications = ?,
          salary_range = ?, job_identification = ?, job_category = ?,
          degree_level = ?, ecl_gtc_required = ?, posting_date = ?,
          scrape_run_id = ?, updated_at = CURRENT_TIMESTAMP
        WHERE job_url = ?
        `,
        [title, ...fields, runId, job.url],
      );
      result.updated += 1;
    }

    return result;
  }

  /** Rows of `vw_jobs_full`, optionally limited to one company or to jobs last seen in given runs. */
  getJobsForExport(filter: ExportFilter = {}): ExportJobRow[] {
    const conditions: string[] = [];
    const params: SqlParams = [];
    if (filter.companyName) {
      conditions.push('company_name = ?');
      params.push(filter.companyName);
    }
    if (filter.runIds) {
      if (filter.runIds.length === 0) {
        return [];
      }
      conditions.push(
        `job_id IN (SELECT job_id FROM jobs WHERE scrape_run_id IN (${filter.runIds.map(() => '?').join(', ')}))`,
      );
      params.push(...filter.runIds);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.queryRows(
      `
      SELECT *
      FROM vw_jobs_full
      ${where}
      ORDER BY company_name, posting_date DESC, job_title
      `,
      params,
    );

    return rows.map((row) => ({
      company_name: textOrEmpty(row.company_name),
      job_title: textOrEmpty(row.job_title),
      location: textOrNull(row.location),
      job_responsibilities: textOrNull(row.job_responsibilities),
      min_education: textOrNull(row.min_education),
      min_experience: textOrNull(row.min_experience),
      preferred_qualifications: textOrNull(row.preferred_qualifications),
      salary_range: textOrNull(row.salary_range),
      job_identification: textOrNull(row.job_identification),
      job_category: textOrNull(row.job_category),
      degree_level: textOrNull(row.degree_level),
      ecl_gtc_required: textOrNull(row.ecl_gtc_required),
      posting_date: textOrNull(row.posting_date),
      job_url: textOrEmpty(row.job_url),
    }));
  }

  getScrapeRun(runId: number): ScrapeRunRow | null {
    const row = this.firstRow('SELECT * FROM vw_scrape_stats WHERE run_id = ?', [runId]);
    if (!row) {
      return null;
    }
    return {
      run_id: numberOr(row.run_id, runId),
      company_name: textOrNull(row.company_name),
      jobs_found: numberOr(row.jobs_found, 0),
      jobs_new: numberOr(row.jobs_new, 0),
      jobs_updated: numberOr(row.jobs_updated, 0),
      status: textOrEmpty(row.status),
      error_message: textOrNull(row.error_message),
      duration_seconds: row.duration_seconds === null ? null : numberOr(row.duration_seconds, 0),
    };
  }

  private queryRows(sql: string, params: SqlParams = []): SqlRow[] {
    const stmt = this.db.prepare(sql, params);
    const rows: SqlRow[] = [];
    try {
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  private firstRow(sql: string, params: SqlParams = []): SqlRow | null {
    return this.queryRows(sql, params)[0] ?? null;
  }
}
