import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CompanyRecord, Platform } from '../types.js';

export const COMPANIES_CSV_HEADER = ['company_name', 'careers_url', 'platform', 'active'] as const;

const PLATFORMS: readonly Platform[] = ['workday', 'oracle', 'custom'];

export function escapeCell(value: string): string {
  const needsQuote = /[",\r\n]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuote ? `"${escaped}"` : escaped;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | null | undefined>>): string {
  const lines = [header, ...rows].map((row) => row.map((cell) => escapeCell(cell ?? '')).join(','));
  return `${lines.join('\n')}\n`;
}

export async function writeCsv(
  filePath: string,
  header: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | null | undefined>>,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, toCsv(header, rows), 'utf8');
}

export function parseCsvContent(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          cell += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      continue;
    }

    if (char === ',') {
      row.push(cell);
      cell = '';
      continue;
    }

    if (char === '\n') {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
      continue;
    }

    if (char === '\r') {
      continue;
    }

    cell += char;
  }

  if (cell.length > 0 || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  return rows;
}

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

function parseActive(value: string | undefined): boolean {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === '') {
    return true;
  }
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

/** Parses companies CSV content; columns are located by header name. */
export function parseCompaniesCsv(content: string, source = 'companies CSV'): CompanyRecord[] {
  const rows = parseCsvContent(content.replace(/^\uFEFF/, '')).filter((row) =>
    row.some((cell) => cell.trim().length > 0),
  );
  if (rows.length === 0) {
    throw new Error(`No header in ${source}`);
  }

  const header = rows[0].map((cell) => cell.trim().toLowerCase());
  const missing = COMPANIES_CSV_HEADER.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new Error(`Unexpected header in ${source}: missing ${missing.join(', ')}`);
  }
  const column = (cells: string[], name: (typeof COMPANIES_CSV_HEADER)[number]): string | undefined =>
    cells[header.indexOf(name)]?.trim();

  const records: CompanyRecord[] = [];
  for (const [index, cells] of rows.slice(1).entries()) {
    const companyName = column(cells, 'company_name');
    const careersUrl = column(cells, 'careers_url');
    const platform = (column(cells, 'platform') ?? '').toLowerCase();
    if (!companyName || !careersUrl) {
      throw new Error(`Missing company_name or careers_url on row ${index + 2} of ${source}`);
    }
    if (!isPlatform(platform)) {
      throw new Error(`Unknown platform "${platform}" for ${companyName} in ${source}`);
    }

    records.push({
      company_name: companyName,
      careers_url: careersUrl,
      platform,
      active: parseActive(column(cells, 'active')),
    });
  }

  return records;
}

/** Active companies only. */
export async function readCompaniesCsv(filePath: string): Promise<CompanyRecord[]> {
  const content = await readFile(filePath, 'utf8');
  return parseCompaniesCsv(content, filePath).filter((company) => company.active);
}
