import nodemailer from 'nodemailer';
import type { EmailSettings } from '../config.js';
import type { CompanyRunResult, QuarterlyRunSummary } from '../monitor/types.js';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function failedCompanies(summary: QuarterlyRunSummary): CompanyRunResult[] {
  return summary.companies.filter((company) => company.status === 'failed');
}

function companyLine(company: CompanyRunResult): string {
  const counts = `${company.jobsFound} found, ${company.jobsNew} new, ${company.jobsUpdated} updated`;
  const error = company.errorMessage ? ` (${company.errorMessage})` : '';
  return `${company.companyName} [${company.status}]: ${counts}${error}`;
}

export function renderSummarySubject(summary: QuarterlyRunSummary): string {
  const failed = failedCompanies(summary).length;
  const suffix = failed > 0 ? ` - ${failed} failed` : '';
  return `Semiconductor jobs scrape ${summary.quarter.label}: ${summary.totalJobs} jobs${suffix}`;
}

export function renderSummaryText(summary: QuarterlyRunSummary): string {
  const lines: string[] = [
    `Semiconductor Jobs Scrape - ${summary.quarter.label}`,
    '',
    `Started: ${summary.startedAt}`,
    `Finished: ${summary.finishedAt}`,
    `Duration: ${summary.durationMinutes.toFixed(2)} minutes`,
    `Total jobs: ${summary.totalJobs}`,
    '',
    'Companies:',
  ];

  if (summary.companies.length === 0) {
    lines.push('No companies scraped this run.');
  } else {
    for (const company of summary.companies) {
      lines.push(`- ${companyLine(company)}`);
    }
  }

  if (summary.combinedExportPath) {
    lines.push('', `Combined export: ${summary.combinedExportPath}`);
  }
  return lines.join('\n');
}

export function renderSummaryHtml(summary: QuarterlyRunSummary): string {
  const rows = summary.companies
    .map(
      (company) =>
        `<tr><td>${escapeHtml(company.companyName)}</td><td>${escapeHtml(company.status)}</td>` +
        `<td>${company.jobsFound}</td><td>${company.jobsNew}</td><td>${company.jobsUpdated}</td>` +
        `<td>${escapeHtml(company.errorMessage ?? '')}</td></tr>`,
    )
    .join('\n');

  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>Semiconductor Jobs Scrape ${escapeHtml(summary.quarter.label)}</title>
  </head>
  <body>
    <h1>Semiconductor Jobs Scrape - ${escapeHtml(summary.quarter.label)}</h1>
    <ul>
      <li>Started: ${escapeHtml(summary.startedAt)}</li>
      <li>Finished: ${escapeHtml(summary.finishedAt)}</li>
      <li>Duration: ${summary.durationMinutes.toFixed(2)} minutes</li>
      <li>Total jobs: ${summary.totalJobs}</li>
    </ul>
    ${
      rows
        ? `<table>\n<tr><th>Company</th><th>Status</th><th>Found</th><th>New</th><th>Updated</th><th>Error</th></tr>\n${rows}\n</table>`
        : '<p>No companies scraped this run.</p>'
    }
  </body>
</html>`;
}

export function shouldSendSummary(settings: EmailSettings, summary: QuarterlyRunSummary): boolean {
  if (failedCompanies(summary).length > 0) {
    return settings.sendOnError;
  }
  return settings.sendOnCompletion;
}

export async function sendSummaryEmail(
  settings: EmailSettings,
  summary: QuarterlyRunSummary,
): Promise<{ sent: boolean; reason?: string }> {
  if (!shouldSendSummary(settings, summary)) {
    return { sent: false, reason: 'Email disabled for this outcome.' };
  }

  const { host, port, user, pass, from, to } = settings;
  if (!host || !port || !user || !pass || !from || !to) {
    return { sent: false, reason: 'Missing SMTP environment variables.' };
  }

  const parsedPort = Number(port);
  if (!Number.isFinite(parsedPort)) {
    return { sent: false, reason: `Invalid SMTP port: ${port}` };
  }

  const transporter = nodemailer.createTransport({
    host,
    port: parsedPort,
    secure: parsedPort === 465,
    auth: {
      user,
      pass,
    },
  });

  await transporter.sendMail({
    from,
    to,
    subject: renderSummarySubject(summary),
    html: renderSummaryHtml(summary),
    text: renderSummaryText(summary),
  });

  return { sent: true };
}
