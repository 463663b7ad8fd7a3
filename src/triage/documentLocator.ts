import fs from 'node:fs/promises';
import path from 'node:path';
import { DOCUMENT_KINDS, type DocumentKind } from '../assessment/types.js';

/**
 * Naming convention for application folders: a file belongs to a document
 * kind when its name contains the kind's keyword and has the expected extension.
 */
export const DOCUMENT_NAMING_CONVENTION: Record<DocumentKind, { keyword: string; extension: string }> = {
  identity_card: { keyword: 'emirates_id', extension: '.png' },
  bank_statement: { keyword: 'bank_statement', extension: '.pdf' },
  employment_letter: { keyword: 'employment_letter', extension: '.pdf' },
  resume: { keyword: 'resume', extension: '.pdf' },
  assets_liabilities: { keyword: 'assets_liabilities', extension: '.xlsx' },
  credit_report: { keyword: 'credit_report', extension: '.json' },
};

/**
 * Document kind for a bare filename, or null when it follows no convention.
 */
export function matchDocumentKind(filename: string): DocumentKind | null {
  const lower = filename.toLowerCase();
  const extension = path.extname(lower);
  return DOCUMENT_KINDS.find((kind) => {
    const rule = DOCUMENT_NAMING_CONVENTION[kind];
    return extension === rule.extension && lower.includes(rule.keyword);
  }) ?? null;
}

export interface LocatedDocuments {
  found: Partial<Record<DocumentKind, string>>;
  missing: DocumentKind[];
}

/**
 * Scans one application directory. With several candidates for a kind the
 * lexicographically first filename wins. A missing directory yields all six
 * kinds as missing.
 */
export async function locateDocuments(applicationDir: string): Promise<LocatedDocuments> {
  let entries: string[];
  try {
    const dirents = await fs.readdir(applicationDir, { withFileTypes: true });
    entries = dirents.filter((d) => d.isFile()).map((d) => d.name).sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      entries = [];
    } else {
      throw error;
    }
  }

  const found: Partial<Record<DocumentKind, string>> = {};
  for (const name of entries) {
    const kind = matchDocumentKind(name);
    if (kind && !found[kind]) {
      found[kind] = path.join(applicationDir, name);
    }
  }

  return {
    found,
    missing: DOCUMENT_KINDS.filter((kind) => !found[kind]),
  };
}

/**
 * Application ids under a root directory: one sub-directory per application, sorted.
 */
export async function listApplicationIds(root: string): Promise<string[]> {
  const dirents = await fs.readdir(root, { withFileTypes: true });
  return dirents
    .filter((d) => d.isDirectory() && !d.name.startsWith('.'))
    .map((d) => d.name)
    .sort();
}
