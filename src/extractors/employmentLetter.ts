/**
 * Employment letter field extraction: employer, position, salary and dates.
 *
 * Letters are free text, so each field has a labeled form ("Position: ...")
 * and the sentence forms HR departments usually write.
 */

import type { EmploymentInfo } from '../assessment/types.js';
import { DATE_TOKEN_REGEX, normalizeText, parseAmount, sanitizeDate } from '../assessment/validators.js';
import type { DecodedContent } from '../decoders/documentDecoder.js';
import { err, ok, textOf, type ExtractorResult } from './extractorResult.js';
import { labeledValue, splitLines, toTitleCase } from './textFields.js';

export const EMPLOYMENT_LETTER_CONFIDENCE = 0.9;

const COMPANY_SUFFIX_REGEX = /\b(?:L\.?L\.?C|Ltd|Limited|PJSC|P\.J\.S\.C|FZE|FZCO|FZ-LLC|Group|Holding|Holdings|Company|Corporation|Co\.|Est\.|Establishment|Bank|Authority|Hospital|University)\b/i;

// Salary must carry a currency marker; a bare number in a letter is too ambiguous.
const SALARY_REGEX = /(?:salary|remuneration|compensation|pay)[^.\n]*?\b(?:AED|Dhs?|Dirhams?)\.?\s*([\d,]+(?:\.\d{1,2})?)/i;
const CURRENCY_AMOUNT_REGEX = /\b(?:AED|Dhs?)\.?\s*([\d,]+(?:\.\d{1,2})?)/i;

const EMPLOYER_SENTENCE_REGEXES = [
  /\b(?:valued\s+)?employee\s+of\s+(.+?)(?:\.\s|\.$|,|\n|\s+(?:as|since|from)\b)/i,
  /\bemployed\s+(?:with|by|at)\s+(.+?)(?:\.\s|\.$|,|\n|\s+(?:as|since|from)\b)/i,
  /\bworking\s+(?:with|for|at)\s+(.+?)(?:\.\s|\.$|,|\n|\s+(?:as|since|from)\b)/i,
];

const TITLE_SENTENCE_REGEXES = [
  /\bemployed\s+as\s+(?:an?\s+)?(.+?)(?:\s+(?:in|at|with|since|from)\b|[.,\n])/i,
  /\bworking\s+as\s+(?:an?\s+)?(.+?)(?:\s+(?:in|at|with|since|from)\b|[.,\n])/i,
  /\bposition\s+of\s+(?:an?\s+)?(.+?)(?:\s+(?:in|at|with|since|from)\b|[.,\n])/i,
];

const DATE = DATE_TOKEN_REGEX.source;
const START_DATE_REGEXES = [
  new RegExp(`\\b(?:joined|started|commenced)\\b[^.\\n]*?\\b(?:on|from|since)\\s+(${DATE})`, 'i'),
  new RegExp(`\\b(?:employed|working)\\b[^.\\n]*?\\bsince\\s+(${DATE})`, 'i'),
];
const END_DATE_REGEX = new RegExp(`\\b(?:last\\s+working\\s+day|end\\s+date|until|till)\\b[^.\\n]*?(${DATE})`, 'i');

function firstMatch(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      const value = normalizeText(match[1]);
      if (value) return value;
    }
  }
  return null;
}

function findEmployer(text: string, lines: string[]): string | null {
  const labeled = labeledValue(text, ['Employer', 'Company', 'Company Name', 'Organization', 'Organisation']);
  if (labeled) return labeled;

  const sentence = firstMatch(text.replace(/\s*\n\s*/g, ' '), EMPLOYER_SENTENCE_REGEXES);
  if (sentence) return sentence;

  // Letterhead: the first line naming a company.
  const letterhead = lines.slice(0, 5).find((line) => COMPANY_SUFFIX_REGEX.test(line) && !/\d/.test(line));
  return letterhead ? toTitleCase(letterhead) : null;
}

function findDate(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      const iso = sanitizeDate(match[1]);
      if (iso) return iso;
    }
  }
  return null;
}

function findSalary(text: string): number | null {
  const labeled = labeledValue(text, ['Monthly Salary', 'Salary', 'Gross Salary', 'Basic Salary']);
  if (labeled) {
    const match = CURRENCY_AMOUNT_REGEX.exec(labeled);
    if (match) return parseAmount(match[1]);
  }
  const sentence = SALARY_REGEX.exec(text.replace(/\s*\n\s*/g, ' '));
  return sentence ? parseAmount(sentence[1]) : null;
}

export function extractEmploymentLetter(content: DecodedContent): ExtractorResult<EmploymentInfo> {
  const decoded = textOf(content);
  if (!decoded) {
    return err(`Employment letter must be decoded to text, got ${content.format}`);
  }
  if (decoded.text.trim() === '') {
    return err('No text decoded from employment letter', decoded.method);
  }

  const text = decoded.text;
  const flattened = text.replace(/\s*\n\s*/g, ' ');
  const lines = splitLines(text);

  const startDate = sanitizeDate(labeledValue(text, ['Start Date', 'Date of Joining', 'Joining Date']))
    ?? findDate(flattened, START_DATE_REGEXES);
  const endDate = findDate(flattened, [END_DATE_REGEX]);

  const fields: EmploymentInfo = {
    employer: findEmployer(text, lines),
    jobTitle: labeledValue(text, ['Position', 'Job Title', 'Designation', 'Title'])
      ?? firstMatch(flattened, TITLE_SENTENCE_REGEXES),
    startDate,
    endDate,
    monthlySalary: findSalary(text),
    currency: 'AED',
    employmentStatus: endDate ? 'ended' : 'active',
  };

  const warnings: string[] = [];
  if (!fields.employer) warnings.push('Employer not found in employment letter');
  if (!fields.jobTitle) warnings.push('Job title not found in employment letter');
  if (fields.monthlySalary === null) warnings.push('Monthly salary (with currency) not found in employment letter');
  if (!fields.startDate) warnings.push('Start date not found in employment letter');

  return ok(fields, EMPLOYMENT_LETTER_CONFIDENCE, decoded.method, warnings);
}
