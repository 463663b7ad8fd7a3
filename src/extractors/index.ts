/**
 * Extractor registry and the boundary that turns every outcome (success,
 * parse error, decode error, timeout) into fields plus ExtractionMetadata.
 */

import type {
  DocumentFieldsByKind,
  DocumentKind,
  ExtractionMetadata,
  ExtractionStatus,
} from '../assessment/types.js';
import type { DecodedContent, DocumentDecoder } from '../decoders/documentDecoder.js';
import { logExtractorError } from '../utils/logging.js';
import { createContextLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { extractAssetsLiabilities } from './assetsLiabilities.js';
import { extractBankStatement } from './bankStatementTransactions.js';
import { extractCreditReport } from './creditReport.js';
import { extractEmiratesIdentity } from './emiratesIdentity.js';
import { extractEmploymentLetter } from './employmentLetter.js';
import type { ExtractorResult, FieldExtractor } from './extractorResult.js';
import { extractResume } from './resume.js';

export type FieldExtractors = { [K in DocumentKind]: FieldExtractor<DocumentFieldsByKind[K]> };

/**
 * Extractors for every document kind. `referenceYear` anchors "present"
 * ranges in résumés so reruns stay reproducible.
 */
export function createFieldExtractors(referenceYear: number): FieldExtractors {
  return {
    identity_card: extractEmiratesIdentity,
    bank_statement: extractBankStatement,
    employment_letter: extractEmploymentLetter,
    resume: (content) => extractResume(content, referenceYear),
    assets_liabilities: extractAssetsLiabilities,
    credit_report: extractCreditReport,
  };
}

export interface DocumentExtraction<K extends DocumentKind> {
  kind: K;
  fields: DocumentFieldsByKind[K] | null;
  metadata: ExtractionMetadata;
}

export interface RunExtractionOptions {
  decoder: DocumentDecoder;
  extractors: FieldExtractors;
  timeoutMs: number;
  /** Millisecond clock used for processing durations. */
  now?: () => number;
  applicationId?: string;
}

export function missingDocument<K extends DocumentKind>(kind: K): DocumentExtraction<K> {
  return {
    kind,
    fields: null,
    metadata: {
      documentKind: kind,
      status: 'missing',
      confidence: 0,
      errors: [],
      warnings: [],
      processingDurationMs: 0,
      extractionMethod: 'none',
      sourcePath: null,
    },
  };
}

function statusFor<T>(result: ExtractorResult<T>): ExtractionStatus {
  if (!result.ok || result.confidence <= 0) return 'failed';
  return result.warnings.length > 0 ? 'partial' : 'success';
}

/**
 * Decodes and extracts one document. Never throws: failures and timeouts come
 * back as `status=failed` with confidence 0 and the error message recorded.
 */
export async function runExtraction<K extends DocumentKind>(
  kind: K,
  sourcePath: string,
  options: RunExtractionOptions
): Promise<DocumentExtraction<K>> {
  const now = options.now ?? (() => performance.now());
  const log = createContextLogger({ applicationId: options.applicationId, documentKind: kind });
  const extractor: FieldExtractor<DocumentFieldsByKind[K]> = options.extractors[kind];
  const started = now();

  let result: ExtractorResult<DocumentFieldsByKind[K]>;
  let thrown = false;
  try {
    result = await withTimeout(
      async () => {
        const content: DecodedContent = await options.decoder.decode(sourcePath);
        return extractor(content);
      },
      options.timeoutMs,
      `Extraction of ${kind}`
    );
  } catch (error) {
    thrown = true;
    logExtractorError(kind, sourcePath, error, log);
    result = {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
      method: 'none',
    };
  }

  const processingDurationMs = Math.max(0, Math.round(now() - started));
  const status = statusFor(result);

  if (!result.ok) {
    if (!thrown) {
      log.warn({ event: 'extraction_failed', reason: result.reason, processingDurationMs }, 'Document could not be extracted');
    }
    return {
      kind,
      fields: null,
      metadata: {
        documentKind: kind,
        status,
        confidence: 0,
        errors: [result.reason],
        warnings: [],
        processingDurationMs,
        extractionMethod: result.method,
        sourcePath,
      },
    };
  }

  log.debug(
    { event: 'extraction_completed', status, confidence: result.confidence, processingDurationMs },
    'Document extracted'
  );
  return {
    kind,
    fields: status === 'failed' ? null : result.fields,
    metadata: {
      documentKind: kind,
      status,
      confidence: status === 'failed' ? 0 : result.confidence,
      errors: [],
      warnings: result.warnings,
      processingDurationMs,
      extractionMethod: result.method,
      sourcePath,
    },
  };
}

export { extractAssetsLiabilities } from './assetsLiabilities.js';
export { extractBankStatement } from './bankStatementTransactions.js';
export { extractCreditReport } from './creditReport.js';
export { extractEmiratesIdentity } from './emiratesIdentity.js';
export { extractEmploymentLetter } from './employmentLetter.js';
export { extractResume } from './resume.js';
