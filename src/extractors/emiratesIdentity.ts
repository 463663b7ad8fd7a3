/**
 * Identity card (Emirates ID) field extraction from OCR text.
 */

import type { IdentityCardFields } from '../assessment/types.js';
import {
  NATIONAL_ID_CANDIDATE_REGEX,
  findDates,
  normalizeNationalId,
  normalizeText,
} from '../assessment/validators.js';
import { err, ok, textOf, type ExtractorResult } from './extractorResult.js';
import type { DecodedContent } from '../decoders/documentDecoder.js';
import { containsKeyword, hasDigitsAndLetters, labeledValue, splitLines, toTitleCase } from './textFields.js';

export const ID_CARD_CONFIDENCE = {
  mixedText: 0.85,
  textOnly: 0.65,
} as const;

// Printed captions that must never be mistaken for the holder's name.
const CARD_CAPTIONS = [
  'united arab emirates',
  'identity card',
  'resident identity',
  'federal authority',
  'id no',
  'id number',
  'emirates id',
  'nationality',
  'date of birth',
  'dob',
  'issued',
  'expires',
  'expiry',
  'signature',
  'sex',
];

/** Demonym or country keyword → canonical nationality. */
export const NATIONALITY_KEYWORDS: Record<string, string> = {
  emirati: 'UAE',
  uae: 'UAE',
  'united arab emirates': 'UAE',
  indian: 'India',
  india: 'India',
  pakistani: 'Pakistan',
  pakistan: 'Pakistan',
  egyptian: 'Egypt',
  egypt: 'Egypt',
  filipino: 'Philippines',
  philippines: 'Philippines',
  bangladeshi: 'Bangladesh',
  bangladesh: 'Bangladesh',
  jordanian: 'Jordan',
  jordan: 'Jordan',
  syrian: 'Syria',
  syria: 'Syria',
  lebanese: 'Lebanon',
  lebanon: 'Lebanon',
  sudanese: 'Sudan',
  sudan: 'Sudan',
  yemeni: 'Yemen',
  yemen: 'Yemen',
  'sri lankan': 'Sri Lanka',
  'sri lanka': 'Sri Lanka',
  nepalese: 'Nepal',
  nepal: 'Nepal',
};

// The card header always prints the issuing country, so a bare scan skips it.
const HEADER_NATIONALITIES = new Set(['uae', 'united arab emirates']);

function canonicalNationality(value: string): string {
  const lowered = value.trim().toLowerCase();
  return NATIONALITY_KEYWORDS[lowered] ?? toTitleCase(value.trim());
}

function findNationality(text: string): string | null {
  const labeled = labeledValue(text, ['Nationality']);
  if (labeled) return canonicalNationality(labeled);

  const lowered = text.toLowerCase();
  for (const [keyword, nationality] of Object.entries(NATIONALITY_KEYWORDS)) {
    if (HEADER_NATIONALITIES.has(keyword)) continue;
    if (new RegExp(`\\b${keyword}\\b`).test(lowered)) return nationality;
  }
  return null;
}

function findName(text: string, lines: string[]): string | null {
  const labeled = labeledValue(text, ['Name', 'Full Name']);
  if (labeled) return labeled;

  const candidate = lines.find(
    (line) => /^[A-Za-z][A-Za-z' .-]+$/.test(line)
      && line.trim().split(/\s+/).length >= 2
      && !containsKeyword(line, CARD_CAPTIONS)
  );
  return candidate ? normalizeText(candidate) : null;
}

function findDateOfBirth(lines: string[]): string | null {
  const line = lines.find((l) => /\b(?:dob|date of birth|birth)\b/i.test(l));
  if (!line) return null;
  return findDates(line)[0] ?? null;
}

function findNationalId(text: string, lines: string[]): string | null {
  const labeledLine = lines.find((l) => /\bid\b/i.test(l) && NATIONAL_ID_CANDIDATE_REGEX.test(l));
  const source = labeledLine ?? text;
  const match = NATIONAL_ID_CANDIDATE_REGEX.exec(source);
  return match ? normalizeNationalId(match[0]) : null;
}

export function extractEmiratesIdentity(content: DecodedContent): ExtractorResult<IdentityCardFields> {
  const decoded = textOf(content);
  if (!decoded) {
    return err(`Identity card must be decoded to text, got ${content.format}`);
  }
  if (decoded.text.trim() === '') {
    return err('No text decoded from identity card', decoded.method);
  }

  const { text, method } = decoded;
  const lines = splitLines(text);
  const confidence = hasDigitsAndLetters(text) ? ID_CARD_CONFIDENCE.mixedText : ID_CARD_CONFIDENCE.textOnly;

  const fields: IdentityCardFields = {
    fullName: findName(text, lines),
    nationalId: findNationalId(text, lines),
    dateOfBirth: findDateOfBirth(lines),
    nationality: findNationality(text),
  };

  const warnings: string[] = [];
  if (!fields.fullName) warnings.push('Name not found on identity card');
  if (!fields.nationalId) warnings.push('National id not found on identity card');
  if (!fields.dateOfBirth) warnings.push('Date of birth not found on identity card');
  if (!fields.nationality) warnings.push('Nationality not found on identity card');

  return ok(fields, confidence, method, warnings);
}
