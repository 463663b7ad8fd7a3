import type { Logger } from 'pino';
import { logger as rootLogger } from './logger.js';

/** Decoder and extractor failures share one event shape so they can be filtered. */
export function logExtractorError(
  documentKind: string,
  filePath: string | null,
  error: unknown,
  log: Logger = rootLogger
): void {
  const reason = error instanceof Error ? error.message : String(error);
  log.warn(
    { event: 'extraction_failed', documentKind, file: filePath, reason },
    'Document extraction failed'
  );
}
