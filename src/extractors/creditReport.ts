/**
 * Credit bureau report extraction from structured JSON.
 */

import { z } from 'zod';
import type { CreditAccount, CreditReport } from '../assessment/types.js';
import { normalizeText, parseAmount, sanitizeDate } from '../assessment/validators.js';
import type { DecodedContent } from '../decoders/documentDecoder.js';
import { err, ok, type ExtractorResult } from './extractorResult.js';

export const CREDIT_REPORT_CONFIDENCE = 0.98;

export const CREDIT_SCORE_SCALE = { min: 0, max: 1800 } as const;

/** Rating bands on the bureau scale, highest first. */
export const CREDIT_SCORE_RANGES: readonly { rating: string; min: number; max: number }[] = [
  { rating: 'Excellent', min: 1600, max: 1800 },
  { rating: 'Very Good', min: 1400, max: 1599 },
  { rating: 'Good', min: 1200, max: 1399 },
  { rating: 'Fair', min: 1000, max: 1199 },
  { rating: 'Poor', min: 0, max: 999 },
];

const DELINQUENT_STATUS_REGEX = /delinquen|default|written[\s-]?off|write[\s-]?off|overdue|past\s+due|charged[\s-]?off/i;

// Bureau exports are loose about types: numbers sometimes arrive as "12,500.00".
const numeric = z.preprocess(
  (value) => (typeof value === 'string' ? parseAmount(value) : value),
  z.number().finite().nullable()
).optional();

const text = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string().nullable()
).optional();

const CreditAccountSchema = z.object({
  account_type: text,
  institution: text,
  account_status: text,
  status: text,
  balance: numeric,
  credit_limit: numeric,
  last_payment_amount: numeric,
}).passthrough();

const CreditReportSchema = z.object({
  report_id: text,
  report_date: text,
  bureau_name: text,
  credit_score: numeric,
  credit_rating: text,
  payment_history: z.object({
    on_time_payments: numeric,
    late_payments_30_days: numeric,
    late_payments_60_days: numeric,
    missed_payments: numeric,
    payment_ratio: numeric,
  }).passthrough().nullable().optional(),
  credit_accounts: z.array(CreditAccountSchema).nullable().optional(),
  total_outstanding: numeric,
  enquiries: z.array(z.object({
    date: text,
    type: text,
    institution: text,
  }).passthrough()).nullable().optional(),
  remarks: text,
}).passthrough();

export function ratingForScore(score: number): string | null {
  return CREDIT_SCORE_RANGES.find((range) => score >= range.min && score <= range.max)?.rating ?? null;
}

export function isDelinquentStatus(status: string | null): boolean {
  return status !== null && DELINQUENT_STATUS_REGEX.test(status);
}

function toAccount(raw: z.infer<typeof CreditAccountSchema>): CreditAccount {
  const status = normalizeText(raw.account_status ?? raw.status);
  return {
    accountType: normalizeText(raw.account_type) ?? 'Unknown',
    institution: normalizeText(raw.institution),
    status,
    balance: raw.balance ?? 0,
    creditLimit: raw.credit_limit ?? null,
    lastPaymentAmount: raw.last_payment_amount ?? null,
    isDelinquent: isDelinquentStatus(status),
  };
}

export function extractCreditReport(content: DecodedContent): ExtractorResult<CreditReport> {
  if (content.format !== 'json') {
    return err(`Credit report must be JSON, got ${content.format}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content.raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(`Credit report is not valid JSON: ${message}`, 'json');
  }

  const parsed = CreditReportSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(`Credit report has an unexpected shape at ${issue.path.join('.') || '(root)'}: ${issue.message}`, 'json');
  }

  const report = parsed.data;
  const history = report.payment_history;
  const score = report.credit_score ?? null;

  const fields: CreditReport = {
    bureauName: normalizeText(report.bureau_name),
    reportDate: sanitizeDate(report.report_date),
    score,
    rating: normalizeText(report.credit_rating) ?? (score !== null ? ratingForScore(score) : null),
    accounts: (report.credit_accounts ?? []).map(toAccount),
    paymentHistory: {
      onTimePayments: history?.on_time_payments ?? 0,
      latePayments30Days: history?.late_payments_30_days ?? 0,
      latePayments60Days: history?.late_payments_60_days ?? 0,
      missedPayments: history?.missed_payments ?? 0,
      paymentRatio: history?.payment_ratio ?? null,
    },
    totalOutstanding: report.total_outstanding ?? null,
    enquiries: (report.enquiries ?? []).map((enquiry) => ({
      date: sanitizeDate(enquiry.date),
      type: normalizeText(enquiry.type),
      institution: normalizeText(enquiry.institution),
    })),
    remarks: normalizeText(report.remarks),
  };

  const warnings: string[] = [];
  if (score === null) warnings.push('Credit score missing from report');
  else if (score < CREDIT_SCORE_SCALE.min || score > CREDIT_SCORE_SCALE.max) {
    warnings.push(`Credit score ${score} outside the ${CREDIT_SCORE_SCALE.min}-${CREDIT_SCORE_SCALE.max} scale`);
  }
  if (report.payment_history == null) warnings.push('Payment history missing from report');

  return ok(fields, CREDIT_REPORT_CONFIDENCE, 'json', warnings);
}
