/**
 * Pattern helpers shared by the text-based extractors.
 */

import { normalizeText } from '../assessment/validators.js';

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value after the first "Label:" (or "Label -") found at the start of a line.
 */
export function labeledValue(text: string, labels: readonly string[]): string | null {
  const alternatives = labels.map(escapeRegex).join('|');
  const pattern = new RegExp(`^\\s*(?:${alternatives})\\s*[:\\-]\\s*(.+)$`, 'im');
  const match = pattern.exec(text);
  return match ? normalizeText(match[1]) : null;
}

export function hasDigitsAndLetters(text: string): boolean {
  return /\d/.test(text) && /[A-Za-z\u0600-\u06FF]/.test(text);
}

export function containsKeyword(value: string, keywords: readonly string[]): boolean {
  const lowered = value.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s'-])([a-z])/g, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());
}
