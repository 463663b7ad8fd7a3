/**
 * Tagged results returned by the per-document field extractors.
 */

import type { DecodedContent } from '../decoders/documentDecoder.js';
import type { ExtractionMethod } from '../assessment/types.js';

export type ExtractorResult<T> =
  | { ok: true; fields: T; confidence: number; method: ExtractionMethod; warnings: string[] }
  | { ok: false; reason: string; method: ExtractionMethod };

export type FieldExtractor<T> = (content: DecodedContent) => ExtractorResult<T>;

export function ok<T>(
  fields: T,
  confidence: number,
  method: ExtractionMethod,
  warnings: string[] = []
): ExtractorResult<T> {
  return { ok: true, fields, confidence, method, warnings };
}

export function err<T>(reason: string, method: ExtractionMethod = 'none'): ExtractorResult<T> {
  return { ok: false, reason, method };
}

/**
 * Text of a PDF or an OCR'd image; null for structured content.
 */
export function textOf(content: DecodedContent): { text: string; method: ExtractionMethod } | null {
  switch (content.format) {
    case 'pdf':
      return { text: content.text, method: 'pdf_text' };
    case 'image':
      return { text: content.text, method: 'ocr_text' };
    default:
      return null;
  }
}
