/**
 * Field Validators and Sanitizers
 *
 * Shared normalization for values recovered from decoded documents.
 * Sanitizers return null when a value is empty or cannot be interpreted.
 */

import { format, isValid, parse } from 'date-fns';
import type { MaritalStatus } from './types.js';

export const NATIONAL_ID_REGEX = /^\d{3}-\d{4}-\d{8}-\d$/;
export const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
export const NATIONAL_ID_CANDIDATE_REGEX = /\b(\d{3})[-\s]?(\d{4})[-\s]?(\d{7,8})[-\s]?(\d)\b/;

const MONTH_NAME = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?';

/** Every date shape the extractors recognise, in document text. */
export const DATE_TOKEN_REGEX = new RegExp(
  [
    '\\b\\d{4}-\\d{2}-\\d{2}\\b',
    '\\b\\d{1,2}[/.-]\\d{1,2}[/.-]\\d{4}\\b',
    `\\b\\d{1,2}\\s+${MONTH_NAME}\\s+\\d{4}\\b`,
    `\\b${MONTH_NAME}\\s+\\d{1,2},?\\s+\\d{4}\\b`,
  ].join('|'),
  'gi'
);

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'dd.MM.yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
  'MMMM d, yyyy',
  'MMMM d yyyy',
  'MMM d, yyyy',
  'MMM d yyyy',
];

const PARSE_REFERENCE = new Date(2000, 0, 1);

const MARITAL_STATUSES: Record<string, MaritalStatus> = {
  single: 'single',
  unmarried: 'single',
  married: 'married',
  divorced: 'divorced',
  widowed: 'widowed',
  widow: 'widowed',
  widower: 'widowed',
  separated: 'separated',
};

/**
 * Trims a value and converts empty strings (and non-strings) to null.
 */
export function normalizeText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Converts a recognised date token to YYYY-MM-DD.
 */
export function sanitizeDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const cleaned = value.trim().replace(/\.$/, '').replace(/\bsept\b/i, 'Sep');
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(cleaned, pattern, PARSE_REFERENCE);
    if (isValid(parsed)) {
      const year = parsed.getFullYear();
      if (year < 1900 || year > 2100) return null;
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

/**
 * All date tokens in the text, in document order, as ISO dates.
 */
export function findDates(text: string): string[] {
  const dates: string[] = [];
  for (const match of text.matchAll(DATE_TOKEN_REGEX)) {
    const iso = sanitizeDate(match[0]);
    if (iso) dates.push(iso);
  }
  return dates;
}

/**
 * Parses amounts such as "AED 8,500.00", "(1,200.50)", "-45" or a spreadsheet number.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  let cleaned = value.trim().replace(/\b(?:AED|Dhs?|USD)\b\.?/gi, '').replace(/[,\s]/g, '');
  let negative = false;
  if (/^\(.*\)$/.test(cleaned)) {
    negative = true;
    cleaned = cleaned.slice(1, -1);
  }
  if (!/^[+-]?\d+(?:\.\d+)?$/.test(cleaned)) return null;

  const amount = Number(cleaned);
  if (!Number.isFinite(amount)) return null;
  return negative ? -amount : amount;
}

/**
 * Rewrites a national-id candidate into dash-delimited groups. The result is
 * not guaranteed to be well-formed; use `isValidNationalId` for that.
 */
export function normalizeNationalId(value: string | null | undefined): string | null {
  if (!value) return null;
  const match = NATIONAL_ID_CANDIDATE_REGEX.exec(value);
  if (match) {
    return match.slice(1, 5).join('-');
  }
  const cleaned = value.trim().replace(/\s+/g, '-');
  return cleaned === '' ? null : cleaned;
}

export function isValidNationalId(value: string | null | undefined): boolean {
  return !!value && NATIONAL_ID_REGEX.test(value);
}

export function normalizeMaritalStatus(value: string | null | undefined): MaritalStatus | null {
  if (!value) return null;
  return MARITAL_STATUSES[value.trim().toLowerCase()] ?? null;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
