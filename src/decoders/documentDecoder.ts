/**
 * Document Decoding
 *
 * Turns a document file into raw content the field extractors understand:
 * PDF text lines and table-like rows (pdfjs), workbook cells (xlsx) and JSON
 * text. Images are not OCR'd here; an upstream OCR step is expected to leave
 * the recognised text beside the image (`emirates_id.png.txt` or
 * `emirates_id.txt`).
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import * as XLSX from 'xlsx';

export type CellValue = string | number | boolean | null;

export interface SheetData {
  name: string;
  rows: CellValue[][];
}

export type DecodedContent =
  | { format: 'pdf'; text: string; tableRows: string[][]; pageCount: number }
  | { format: 'image'; text: string }
  | { format: 'spreadsheet'; sheets: SheetData[] }
  | { format: 'json'; raw: string };

export interface DocumentDecoder {
  decode(filePath: string): Promise<DecodedContent>;
}

export class DocumentDecodeError extends Error {
  constructor(message: string, readonly sourcePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentDecodeError';
  }
}

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.tif', '.tiff']);
const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xls', '.csv']);

// Items closer than this (in PDF units) vertically belong to the same line.
const LINE_TOLERANCE = 2;
// Lines with at least this many separate text runs are treated as table rows.
const MIN_TABLE_CELLS = 3;

interface PositionedText {
  x: number;
  y: number;
  str: string;
}

/**
 * Groups positioned text runs of one page into lines, top to bottom,
 * each line's runs ordered left to right.
 */
export function groupIntoLines(items: readonly PositionedText[]): string[][] {
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: { y: number; runs: PositionedText[] }[] = [];
  for (const item of sorted) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(current.y - item.y) <= LINE_TOLERANCE) {
      current.runs.push(item);
    } else {
      lines.push({ y: item.y, runs: [item] });
    }
  }
  return lines.map((line) =>
    line.runs
      .sort((a, b) => a.x - b.x)
      .map((run) => run.str.trim())
      .filter((cell) => cell.length > 0)
  ).filter((cells) => cells.length > 0);
}

export async function decodePdf(buffer: Uint8Array, sourcePath: string): Promise<DecodedContent> {
  let doc: Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
  try {
    doc = await pdfjsLib.getDocument({ data: buffer, isEvalSupported: false, useSystemFonts: true }).promise;
  } catch (error) {
    throw new DocumentDecodeError(`Unreadable PDF: ${sourcePath}`, sourcePath, { cause: error });
  }

  try {
    const textLines: string[] = [];
    const tableRows: string[][] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const textContent = await page.getTextContent();
      const items: PositionedText[] = [];
      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;
        items.push({ x: Number(item.transform[4]), y: Number(item.transform[5]), str: item.str });
      }
      for (const cells of groupIntoLines(items)) {
        textLines.push(cells.join(' '));
        if (cells.length >= MIN_TABLE_CELLS) tableRows.push(cells);
      }
      page.cleanup();
    }
    return { format: 'pdf', text: textLines.join('\n'), tableRows, pageCount: doc.numPages };
  } finally {
    await doc.destroy();
  }
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

/**
 * Reads every sheet of a workbook (or a CSV) into rows of plain cell values.
 * Blank rows are dropped.
 */
export function decodeWorkbook(workbook: XLSX.WorkBook): SheetData[] {
  return workbook.SheetNames.map((name) => {
    const sheet = workbook.Sheets[name];
    const rows = sheet
      ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true })
      : [];
    return {
      name,
      rows: rows
        .map((row) => row.map(toCellValue))
        .filter((row) => row.some((cell) => cell !== null)),
    };
  });
}

async function readSidecarText(imagePath: string): Promise<string> {
  const parsed = path.parse(imagePath);
  const candidates = [`${imagePath}.txt`, path.join(parsed.dir, `${parsed.name}.txt`)];
  for (const candidate of candidates) {
    try {
      return await fs.readFile(candidate, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') continue;
      throw new DocumentDecodeError(`Unreadable OCR text for ${imagePath}`, imagePath, { cause: error });
    }
  }
  throw new DocumentDecodeError(`No OCR text available for image ${path.basename(imagePath)}`, imagePath);
}

/**
 * Default decoder over the local filesystem, dispatching on file extension.
 */
export class FileDocumentDecoder implements DocumentDecoder {
  async decode(filePath: string): Promise<DecodedContent> {
    const extension = path.extname(filePath).toLowerCase();

    if (IMAGE_EXTENSIONS.has(extension)) {
      return { format: 'image', text: await readSidecarText(filePath) };
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new DocumentDecodeError(`Cannot read ${filePath}`, filePath, { cause: error });
    }

    if (extension === '.pdf') {
      return decodePdf(new Uint8Array(buffer), filePath);
    }

    if (SPREADSHEET_EXTENSIONS.has(extension)) {
      try {
        const workbook = extension === '.csv'
          ? XLSX.read(buffer.toString('utf8'), { type: 'string' })
          : XLSX.read(buffer, { type: 'buffer' });
        return { format: 'spreadsheet', sheets: decodeWorkbook(workbook) };
      } catch (error) {
        throw new DocumentDecodeError(`Unreadable workbook: ${filePath}`, filePath, { cause: error });
      }
    }

    if (extension === '.json') {
      return { format: 'json', raw: buffer.toString('utf8') };
    }

    throw new DocumentDecodeError(`Unsupported document format "${extension}"`, filePath);
  }
}
