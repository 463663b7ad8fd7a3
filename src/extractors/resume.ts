/**
 * Résumé field extraction.
 *
 * The text is cut into sections by their headings; each section has its own
 * small line grammar.
 */

import type { Education, Resume, WorkExperience } from '../assessment/types.js';
import { normalizeText, sanitizeDate } from '../assessment/validators.js';
import type { DecodedContent } from '../decoders/documentDecoder.js';
import { err, ok, textOf, type ExtractorResult } from './extractorResult.js';
import { splitLines } from './textFields.js';

export const RESUME_CONFIDENCE = 0.9;

const SECTION_NAMES = ['summary', 'experience', 'education', 'skills', 'certifications'] as const;

type SectionName = typeof SECTION_NAMES[number];

const SECTION_HEADINGS: Record<SectionName, RegExp> = {
  summary: /^(?:professional\s+)?(?:summary|profile|objective)$/i,
  experience: /^(?:work\s+|professional\s+)?(?:experience|employment\s+history|work\s+history)$/i,
  education: /^(?:education|academic\s+background|qualifications)$/i,
  skills: /^(?:key\s+|core\s+|technical\s+)?skills$/i,
  certifications: /^(?:certifications?|licen[cs]es(?:\s+(?:and|&)\s+certifications)?)$/i,
};

const DATE_PART = String.raw`(?:[A-Za-z]{3,9}\.?\s+)?\d{4}(?:-\d{2}(?:-\d{2})?)?|\d{1,2}/\d{4}`;
const DATE_RANGE_REGEX = new RegExp(`(${DATE_PART})\\s*(?:-|–|—|to)\\s*(${DATE_PART}|present|current|now)`, 'i');
const YEAR_REGEX = /\b(19|20)\d{2}\b/;
const INLINE_ROLE_REGEX = /^(.+?)(?:\s+(?:at|@|-|–)\s+|\s*[,|]\s*)(.+)$/;

function trimPunctuation(value: string | undefined): string | null {
  return normalizeText(value?.replace(/^[\s,;|()–-]+|[\s,;|()–-]+$/g, ''));
}

function splitSections(lines: string[]): Map<SectionName, string[]> {
  const sections = new Map<SectionName, string[]>();
  let current: SectionName | null = null;
  for (const line of lines) {
    const heading = SECTION_NAMES.find((name) => SECTION_HEADINGS[name].test(line.replace(/:$/, '')));
    if (heading) {
      current = heading;
      if (!sections.has(heading)) sections.set(heading, []);
      continue;
    }
    if (current) sections.get(current)?.push(line);
  }
  return sections;
}

/**
 * Normalizes "2019", "Mar 2019", "03/2019" or "2019-03-01" to an ISO date
 * (first day of the period).
 */
export function resumeDate(value: string): string | null {
  const trimmed = value.trim().replace(/\.$/, '');
  const iso = sanitizeDate(trimmed);
  if (iso) return iso;
  if (/^\d{4}$/.test(trimmed)) return `${trimmed}-01-01`;
  if (/^\d{4}-\d{2}$/.test(trimmed)) return `${trimmed}-01`;
  const monthYear = /^(\d{1,2})\/(\d{4})$/.exec(trimmed);
  if (monthYear) return `${monthYear[2]}-${monthYear[1].padStart(2, '0')}-01`;
  return sanitizeDate(`1 ${trimmed}`);
}

/**
 * Each date-range line closes an entry; the lines before it (back to the
 * previous entry) carry the title and employer, either on separate lines or
 * inline ("Accountant at Acme LLC").
 */
export function parseExperience(lines: readonly string[]): WorkExperience[] {
  const entries: WorkExperience[] = [];
  let pending: string[] = [];

  for (const line of lines) {
    const range = DATE_RANGE_REGEX.exec(line);
    if (!range) {
      pending.push(line);
      continue;
    }

    const remainder = trimPunctuation(line.replace(range[0], ''));
    // Descriptions of the previous role may precede the next title, so only the last two lines count.
    const heads = remainder ? [remainder] : pending.slice(-2);
    let jobTitle = heads[0] ?? null;
    let employer = heads[1] ?? null;
    if (jobTitle && !employer) {
      const inline = INLINE_ROLE_REGEX.exec(jobTitle);
      if (inline) {
        jobTitle = inline[1].trim();
        employer = inline[2].trim();
      }
    }

    if (jobTitle) {
      const isCurrent = /present|current|now/i.test(range[2]);
      entries.push({
        jobTitle,
        employer,
        startDate: resumeDate(range[1]),
        endDate: isCurrent ? null : resumeDate(range[2]),
        isCurrent,
      });
    }
    pending = [];
  }
  return entries;
}

/**
 * Education lines: a degree line optionally followed by "Institution (Year)".
 */
export function parseEducation(lines: readonly string[]): Education[] {
  const entries: Education[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const next = lines[i + 1];
    const nextHasYear = next !== undefined && YEAR_REGEX.test(next);

    if (!YEAR_REGEX.test(line) && nextHasYear) {
      const year = YEAR_REGEX.exec(next);
      entries.push({
        degree: line,
        institution: trimPunctuation(next.replace(/\(?\b(19|20)\d{2}\b\)?/, '')),
        graduationYear: year ? Number(year[0]) : null,
      });
      i++;
      continue;
    }

    const year = YEAR_REGEX.exec(line);
    const [degree, institution] = line.replace(/\(?\b(19|20)\d{2}\b\)?/, '').split(/\s+(?:-|–|,|at)\s+/);
    const cleanDegree = trimPunctuation(degree);
    if (cleanDegree) {
      entries.push({
        degree: cleanDegree,
        institution: trimPunctuation(institution),
        graduationYear: year ? Number(year[0]) : null,
      });
    }
  }
  return entries;
}

export function parseList(lines: readonly string[]): string[] {
  const items = lines
    .flatMap((line) => line.split(/[,;|•·]/))
    .map((item) => normalizeText(item.replace(/^[-*]\s*/, '')))
    .filter((item): item is string => item !== null);
  return [...new Set(items)];
}

/**
 * Years between the earliest start and the latest end (or the reference year
 * for a current role).
 */
function yearsOfExperience(experience: readonly WorkExperience[], referenceYear: number): number | null {
  const starts = experience.map((e) => e.startDate).filter((d): d is string => d !== null).map((d) => Number(d.slice(0, 4)));
  if (starts.length === 0) return null;
  const ends = experience.map((e) => (e.isCurrent ? referenceYear : e.endDate ? Number(e.endDate.slice(0, 4)) : null))
    .filter((y): y is number => y !== null);
  const latest = ends.length > 0 ? Math.max(...ends) : Math.max(...starts);
  return Math.max(0, latest - Math.min(...starts));
}

export function extractResume(content: DecodedContent, referenceYear = new Date().getFullYear()): ExtractorResult<Resume> {
  const decoded = textOf(content);
  if (!decoded) {
    return err(`Resume must be decoded to text, got ${content.format}`);
  }
  if (decoded.text.trim() === '') {
    return err('No text decoded from resume', decoded.method);
  }

  const sections = splitSections(splitLines(decoded.text));
  const workExperience = parseExperience(sections.get('experience') ?? []);

  const fields: Resume = {
    summary: normalizeText((sections.get('summary') ?? []).join(' ')),
    workExperience,
    education: parseEducation(sections.get('education') ?? []),
    skills: parseList(sections.get('skills') ?? []),
    certifications: parseList(sections.get('certifications') ?? []),
    yearsOfExperience: yearsOfExperience(workExperience, referenceYear),
  };

  const warnings: string[] = [];
  if (fields.workExperience.length === 0) warnings.push('No work experience entries recognised');
  if (fields.education.length === 0) warnings.push('No education entries recognised');
  if (fields.skills.length === 0) warnings.push('No skills listed');

  return ok(fields, RESUME_CONFIDENCE, decoded.method, warnings);
}
