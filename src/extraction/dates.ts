import type { CalendarDate } from '../types.js';
import { normalizeWhitespace } from '../utils/text.js';

interface DateParts {
  year: number;
  month: number;
  day: number;
}

interface DateFormat {
  pattern: RegExp;
  toParts: (match: RegExpExecArray) => DateParts | null;
}

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function monthFromName(name: string, abbreviated: boolean): number | null {
  const lower = name.toLowerCase();
  const index = abbreviated
    ? MONTHS.findIndex((month) => month.slice(0, 3) === lower)
    : MONTHS.indexOf(lower);
  return index >= 0 ? index + 1 : null;
}

function numericParts(year: string, month: string, day: string): DateParts {
  return { year: Number(year), month: Number(month), day: Number(day) };
}

// Tried in order; each is anchored at the start and may be followed by anything.
const DATE_FORMATS: readonly DateFormat[] = [
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
  {
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})/,
    toParts: (m) => numericParts(m[3], m[1], m[2]),
  },
  {
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    pattern: /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})/,
    toParts: (m) => {
      const month = monthFromName(m[1], false);
      return month ? { year: Number(m[3]), month, day: Number(m[2]) } : null;
    },
  },
  {
    pattern: /^([A-Za-z]{3})\s+(\d{1,2}),\s*(\d{4})/,
    toParts: (m) => {
      const month = monthFromName(m[1], true);
      return month ? { year: Number(m[3]), month, day: Number(m[2]) } : null;
    },
  },
  {
    pattern: /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}:\d{2}/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
];

const RELATIVE_DATE = /(\d+)?\+?\s*(day|week|month)s?\s+ago/i;

function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

function isValidDate(parts: DateParts): boolean {
  return (
    parts.year >= 1000 &&
    parts.month >= 1 &&
    parts.month <= 12 &&
    parts.day >= 1 &&
    parts.day <= daysInMonth(parts.year, parts.month)
  );
}

export function formatCalendarDate(date: Date): CalendarDate {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

function fromParts(parts: DateParts): CalendarDate {
  return `${parts.year}-${String(parts.month).padStart(2, '0')}-${String(parts.day).padStart(2, '0')}`;
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function subtractDays(today: Date, days: number): Date {
  const base = startOfDay(today);
  return new Date(base.getFullYear(), base.getMonth(), base.getDate() - days);
}

/** Month arithmetic that clamps to the end of the target month. */
export function subtractMonths(today: Date, months: number): Date {
  const base = startOfDay(today);
  const target = new Date(base.getFullYear(), base.getMonth() - months, 1);
  const day = Math.min(base.getDate(), daysInMonth(target.getFullYear(), target.getMonth() + 1));
  return new Date(target.getFullYear(), target.getMonth(), day);
}

function parseAbsolute(text: string): CalendarDate | undefined {
  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(text);
    if (!match) {
      continue;
    }
    const parts = format.toParts(match);
    if (parts && isValidDate(parts)) {
      return fromParts(parts);
    }
  }
  return undefined;
}

function parseRelative(text: string, today: Date): CalendarDate | undefined {
  const match = RELATIVE_DATE.exec(text);
  if (match) {
    const amount = match[1] ? Number(match[1]) : 1;
    const unit = match[2].toLowerCase();
    if (unit === 'day') {
      return formatCalendarDate(subtractDays(today, amount));
    }
    if (unit === 'week') {
      return formatCalendarDate(subtractDays(today, amount * 7));
    }
    return formatCalendarDate(subtractMonths(today, amount));
  }

  if (/\byesterday\b/i.test(text)) {
    return formatCalendarDate(subtractDays(today, 1));
  }
  if (/\btoday\b|\bjust posted\b/i.test(text)) {
    return formatCalendarDate(startOfDay(today));
  }
  return undefined;
}

/**
 * Like {@link parseDate}, but reports an unreadable string as `undefined`
 * instead of substituting today's date.
 */
export function parseDateStrict(text: string | undefined | null, today: Date = new Date()): CalendarDate | undefined {
  if (!text) {
    return undefined;
  }
  const normalized = normalizeWhitespace(text);
  if (!normalized) {
    return undefined;
  }
  return parseAbsolute(normalized) ?? parseRelative(normalized, today);
}

/**
 * Parses posting dates as they appear on career sites. Anything non-empty
 * that cannot be read falls back to today's date.
 */
export function parseDate(text: string | undefined | null, today: Date = new Date()): CalendarDate | undefined {
  if (!text || !normalizeWhitespace(text)) {
    return undefined;
  }
  return parseDateStrict(text, today) ?? formatCalendarDate(startOfDay(today));
}
