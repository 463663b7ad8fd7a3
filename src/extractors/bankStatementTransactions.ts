/**
 * Bank statement field extraction: account header, transaction table and
 * derived income figures.
 */

import { differenceInDays, parseISO } from 'date-fns';
import type { BankStatement, BankTransaction } from '../assessment/types.js';
import { findDates, normalizeText, parseAmount, roundTo, sanitizeDate } from '../assessment/validators.js';
import type { DecodedContent } from '../decoders/documentDecoder.js';
import { err, ok, type ExtractorResult } from './extractorResult.js';
import { labeledValue, splitLines } from './textFields.js';

export const BANK_STATEMENT_CONFIDENCE = {
  text: 0.9,
  tables: 0.85,
} as const;

/** Credits below this amount are never counted as salary. */
export const SALARY_DEPOSIT_FLOOR = 500;

export const INCOME_KEYWORDS = ['salary', 'payroll', 'wage', 'wps', 'allowance', 'pension'] as const;

interface KnownBank {
  name: string;
  aliases: string[];
}

export const KNOWN_BANKS: KnownBank[] = [
  { name: 'First Abu Dhabi Bank', aliases: ['FAB'] },
  { name: 'Abu Dhabi Islamic Bank', aliases: ['ADIB'] },
  { name: 'Abu Dhabi Commercial Bank', aliases: ['ADCB'] },
  { name: 'Emirates Islamic Bank', aliases: ['Emirates Islamic'] },
  { name: 'Emirates NBD', aliases: ['ENBD'] },
  { name: 'Mashreq Bank', aliases: ['Mashreq'] },
  { name: 'Dubai Islamic Bank', aliases: ['DIB'] },
  { name: 'Commercial Bank of Dubai', aliases: ['CBD'] },
  { name: 'RAKBANK', aliases: ['National Bank of Ras Al Khaimah'] },
];

const ACCOUNT_NUMBER_REGEX = /\b\d{15,20}\b/;
const LABELED_ACCOUNT_REGEX = /account\s*(?:number|no\.?)\s*[:\-]?\s*([\d][\d\s-]{5,28}\d)/i;
const PERIOD_LINE_REGEX = /\b(?:period|from|to)\b/i;
const OPENING_BALANCE_REGEX = /opening\s+balance\s*[:\-]?\s*(?:AED\s*)?(-?[\d,]+(?:\.\d+)?)/i;
const CLOSING_BALANCE_REGEX = /(?:closing|ending|current|available)\s+balance\s*[:\-]?\s*(?:AED\s*)?(-?[\d,]+(?:\.\d+)?)/i;

const AMOUNT = String.raw`(?:AED\s*)?\(?-?[\d,]+\.\d{2}\)?`;
const DATE = String.raw`\d{4}-\d{2}-\d{2}|\d{1,2}[/.-]\d{1,2}[/.-]\d{4}`;
const TRANSACTION_LINE_REGEX = new RegExp(`^(${DATE})\\s+(.+?)\\s+(${AMOUNT})(?:\\s+(${AMOUNT}))?$`, 'i');

const INCOME_KEYWORD_REGEX = new RegExp(`\\b(?:${INCOME_KEYWORDS.join('|')})`, 'i');

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function findBankName(text: string): string | null {
  const lowered = text.toLowerCase();
  for (const bank of KNOWN_BANKS) {
    if (lowered.includes(bank.name.toLowerCase())) return bank.name;
  }
  for (const bank of KNOWN_BANKS) {
    for (const alias of bank.aliases) {
      if (new RegExp(`\\b${escapeRegex(alias)}\\b`, 'i').test(text)) return bank.name;
    }
  }
  return null;
}

function findAccountNumber(text: string): string | null {
  const plain = ACCOUNT_NUMBER_REGEX.exec(text);
  if (plain) return plain[0];
  const labeled = LABELED_ACCOUNT_REGEX.exec(text);
  return labeled ? labeled[1].replace(/[\s-]/g, '') : null;
}

function findBalance(text: string, pattern: RegExp): number | null {
  const match = pattern.exec(text);
  return match ? parseAmount(match[1]) : null;
}

interface RawTransaction {
  date: string;
  description: string;
  signedAmount: number;
  balance: number | null;
}

/**
 * Reads one table row: date first, then description cells, then the amount
 * and an optional balance as the trailing numeric cells.
 */
export function parseTransactionRow(cells: readonly string[]): RawTransaction | null {
  if (cells.length < 3) return null;
  const date = sanitizeDate(cells[0]);
  if (!date) return null;

  const trailing: number[] = [];
  let end = cells.length;
  while (end > 1 && trailing.length < 2) {
    const amount = parseAmount(cells[end - 1]);
    if (amount === null) break;
    trailing.unshift(amount);
    end--;
  }
  if (trailing.length === 0) return null;

  const description = normalizeText(cells.slice(1, end).join(' '));
  if (!description) return null;

  return {
    date,
    description,
    signedAmount: trailing[0],
    balance: trailing.length > 1 ? trailing[1] : null,
  };
}

export function parseTransactionLine(line: string): RawTransaction | null {
  const match = TRANSACTION_LINE_REGEX.exec(line);
  if (!match) return null;
  const date = sanitizeDate(match[1]);
  const amount = parseAmount(match[3]);
  if (!date || amount === null) return null;
  return {
    date,
    description: match[2].trim(),
    signedAmount: amount,
    balance: match[4] ? parseAmount(match[4]) : null,
  };
}

/**
 * Orders by date (stable) and fills running balances: the statement's own
 * balance column wins, otherwise balances accumulate from the opening balance.
 */
export function buildTransactions(raw: readonly RawTransaction[], openingBalance: number | null): BankTransaction[] {
  const ordered = raw
    .map((tx, index) => ({ tx, index }))
    .sort((a, b) => a.tx.date.localeCompare(b.tx.date) || a.index - b.index)
    .map(({ tx }) => tx);

  let balance = openingBalance;
  return ordered.map((tx) => {
    const type = tx.signedAmount < 0 ? 'debit' : 'credit';
    const amount = Math.abs(tx.signedAmount);
    if (tx.balance !== null) {
      balance = tx.balance;
    } else if (balance !== null) {
      balance = roundTo(balance + (type === 'credit' ? amount : -amount), 2);
    }
    return { date: tx.date, description: tx.description, amount, type, runningBalance: balance };
  });
}

export function isSalaryDeposit(tx: BankTransaction): boolean {
  return tx.type === 'credit' && tx.amount >= SALARY_DEPOSIT_FLOOR && INCOME_KEYWORD_REGEX.test(tx.description);
}

/**
 * Whole 30-day months covered by the statement (at least 1). Falls back to the
 * span of the transactions when the period is unknown.
 */
/**
 * Dates on the first "Period: X to Y" style line, or else the two earliest
 * dates anywhere in the statement. Header dates such as a print date sit
 * outside the period and would otherwise widen it.
 */
export function statementPeriod(text: string): { periodStart: string | null; periodEnd: string | null } {
  const rangeLine = splitLines(text)
    .filter((line) => PERIOD_LINE_REGEX.test(line))
    .map(findDates)
    .find((dates) => dates.length >= 2);
  const candidates = rangeLine ? rangeLine.slice(0, 2) : findDates(text);
  const [periodStart = null, periodEnd = null] = [...candidates].sort();
  return { periodStart, periodEnd };
}

export function monthsCovered(
  periodStart: string | null,
  periodEnd: string | null,
  transactions: readonly BankTransaction[]
): number {
  const start = periodStart ?? transactions[0]?.date ?? null;
  const end = periodEnd ?? transactions[transactions.length - 1]?.date ?? null;
  if (!start || !end) return 1;
  const days = differenceInDays(parseISO(end), parseISO(start));
  return Math.max(1, Math.floor(days / 30));
}

function sumAmounts(transactions: readonly BankTransaction[]): number {
  return transactions.reduce((total, tx) => total + tx.amount, 0);
}

export function extractBankStatement(content: DecodedContent): ExtractorResult<BankStatement> {
  if (content.format !== 'pdf') {
    return err(`Bank statement must be a PDF, got ${content.format}`);
  }

  const text = content.text;
  const hasText = text.trim() !== '';
  if (!hasText && content.tableRows.length === 0) {
    return err('No text or tables decoded from bank statement');
  }
  const confidence = hasText ? BANK_STATEMENT_CONFIDENCE.text : BANK_STATEMENT_CONFIDENCE.tables;
  const method = hasText ? 'pdf_text' : 'pdf_table';

  const fromTables = content.tableRows
    .map(parseTransactionRow)
    .filter((tx): tx is RawTransaction => tx !== null);
  const rawTransactions = fromTables.length > 0
    ? fromTables
    : splitLines(text).map(parseTransactionLine).filter((tx): tx is RawTransaction => tx !== null);

  const openingBalance = findBalance(text, OPENING_BALANCE_REGEX);
  const transactions = buildTransactions(rawTransactions, openingBalance);

  const { periodStart, periodEnd } = statementPeriod(text);

  const salaryDeposits = transactions.filter(isSalaryDeposit);
  const months = monthsCovered(periodStart, periodEnd, transactions);
  const credits = transactions.filter((tx) => tx.type === 'credit');
  const debits = transactions.filter((tx) => tx.type === 'debit');

  const closingBalance = findBalance(text, CLOSING_BALANCE_REGEX)
    ?? transactions[transactions.length - 1]?.runningBalance
    ?? null;

  const fields: BankStatement = {
    bankName: findBankName(text),
    accountNumber: findAccountNumber(text),
    accountHolder: labeledValue(text, ['Account Holder', 'Account Name', 'Customer Name']),
    periodStart,
    periodEnd,
    openingBalance,
    closingBalance,
    currency: 'AED',
    transactions,
    salaryDeposits,
    monthlyAverageCredit: roundTo(sumAmounts(credits) / months, 2),
    monthlyAverageDebit: roundTo(sumAmounts(debits) / months, 2),
    monthlyIncome: salaryDeposits.length > 0 ? roundTo(sumAmounts(salaryDeposits) / months, 2) : null,
  };

  const warnings: string[] = [];
  if (!fields.bankName) warnings.push('Bank name not recognised');
  if (!fields.accountNumber) warnings.push('Account number not found');
  if (!fields.periodStart || !fields.periodEnd) warnings.push('Statement period not found');
  if (transactions.length === 0) warnings.push('No transactions recognised');

  return ok(fields, confidence, method, warnings);
}
