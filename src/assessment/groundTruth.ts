/**
 * Ground-truth side-channel: a table of trusted applicant facts keyed by
 * application id, read once per batch and passed around read-only.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import type { MaritalStatus } from './types.js';
import { normalizeMaritalStatus, normalizeNationalId, normalizeText, sanitizeDate } from './validators.js';

export interface GroundTruthRecord {
  applicationId: string;
  fullName: string | null;
  nationalId: string | null;
  age: number | null;
  maritalStatus: MaritalStatus | null;
  nationality: string | null;
  dateOfBirth: string | null;
}

export type GroundTruthLookup = ReadonlyMap<string, GroundTruthRecord>;

const cell = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string().nullable().optional()
);

const GroundTruthRowSchema = z.object({
  application_id: cell,
  full_name: cell,
  emirates_id: cell,
  age: cell,
  marital_status: cell,
  nationality: cell,
  date_of_birth: cell,
});

export type GroundTruthRow = z.input<typeof GroundTruthRowSchema>;

function parseAge(value: string | null | undefined): number | null {
  const text = normalizeText(value);
  if (!text || !/^\d{1,3}(?:\.0+)?$/.test(text)) return null;
  return Math.trunc(Number(text));
}

/**
 * Builds the lookup from already-tabulated rows. Rows without an id are
 * skipped; a repeated id keeps its first row.
 */
export function groundTruthFromRows(rows: readonly unknown[]): GroundTruthLookup {
  const lookup = new Map<string, GroundTruthRecord>();
  for (const row of rows) {
    const parsed = GroundTruthRowSchema.safeParse(row);
    if (!parsed.success) continue;
    const data = parsed.data;
    const applicationId = normalizeText(data.application_id);
    if (!applicationId || lookup.has(applicationId)) continue;

    lookup.set(applicationId, {
      applicationId,
      fullName: normalizeText(data.full_name),
      nationalId: normalizeNationalId(normalizeText(data.emirates_id)),
      age: parseAge(data.age),
      maritalStatus: normalizeMaritalStatus(data.marital_status),
      nationality: normalizeText(data.nationality),
      dateOfBirth: sanitizeDate(normalizeText(data.date_of_birth)),
    });
  }
  return lookup;
}

/**
 * Reads a CSV or XLSX ground-truth file (first sheet, header row).
 */
export async function loadGroundTruth(filePath: string): Promise<GroundTruthLookup> {
  const extension = path.extname(filePath).toLowerCase();
  let workbook: XLSX.WorkBook;
  if (extension === '.csv') {
    // raw keeps ids like 784-1990-... as text instead of guessing dates
    workbook = XLSX.read(await fs.readFile(filePath, 'utf8'), { type: 'string', raw: true });
  } else if (extension === '.xlsx' || extension === '.xls') {
    workbook = XLSX.read(await fs.readFile(filePath), { type: 'buffer' });
  } else {
    throw new Error(`Unsupported ground-truth file type: ${extension || '(none)'}`);
  }

  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) return new Map();

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, raw: false });
  return groundTruthFromRows(rows);
}
