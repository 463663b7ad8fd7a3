/**
 * End-to-end assessment: locate → extract → assemble → validate → score → decide.
 *
 * Applications are independent and run with bounded concurrency. Inside one
 * application the six extractions run concurrently and the assembler waits
 * for all of them.
 */

import path from 'node:path';
import { startOfDay } from 'date-fns';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../core/config.js';
import { FileDocumentDecoder, type DocumentDecoder } from '../decoders/documentDecoder.js';
import {
  createFieldExtractors,
  missingDocument,
  runExtraction,
  type DocumentExtraction,
  type RunExtractionOptions,
} from '../extractors/index.js';
import { listApplicationIds, locateDocuments } from '../triage/documentLocator.js';
import { createContextLogger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/timeout.js';
import { ApplicationAssembler } from './applicationAssembler.js';
import { FeatureWeightApproximation, type ConfidenceModel } from './confidenceModel.js';
import { validateApplication } from './consistencyValidator.js';
import { decideFromSummary, summarizeDecisions } from './decisionEngine.js';
import type { GroundTruthLookup } from './groundTruth.js';
import { aggregateScores } from './scoreAggregator.js';
import type {
  ApplicationExtraction,
  DecisionResult,
  DecisionSummary,
  DocumentKind,
  ValidationResult,
} from './types.js';
import { toValidationSummary, type ValidationSummary } from './validationSummary.js';

export interface AssessmentOptions {
  decoder?: DocumentDecoder;
  groundTruth?: GroundTruthLookup;
  /** Date that ages, employment durations and "present" ranges are measured against. Defaults to the start of today. */
  referenceDate?: Date;
  /** Millisecond clock for processing durations. */
  now?: () => number;
  model?: ConfidenceModel;
  config?: PipelineConfig;
  runId?: string;
}

export interface ApplicationAssessment {
  applicationId: string;
  extraction: ApplicationExtraction;
  validation: ValidationResult;
  summary: ValidationSummary;
  decision: DecisionResult;
}

export interface BatchAssessment {
  assessments: ApplicationAssessment[];
  summary: DecisionSummary;
}

export async function assessApplication(
  applicationDir: string,
  applicationId: string,
  options: AssessmentOptions = {}
): Promise<ApplicationAssessment> {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const referenceDate = options.referenceDate ?? startOfDay(new Date());
  const log = createContextLogger({ applicationId, runId: options.runId });

  const located = await locateDocuments(applicationDir);
  if (located.missing.length > 0) {
    log.info({ event: 'documents_missing', missing: located.missing }, 'Some documents were not found');
  }

  const runOptions: RunExtractionOptions = {
    decoder: options.decoder ?? new FileDocumentDecoder(),
    extractors: createFieldExtractors(referenceDate.getFullYear()),
    timeoutMs: config.documentTimeoutMs,
    now: options.now,
    applicationId,
  };
  const extract = <K extends DocumentKind>(kind: K): Promise<DocumentExtraction<K>> => {
    const sourcePath = located.found[kind];
    return sourcePath ? runExtraction(kind, sourcePath, runOptions) : Promise.resolve(missingDocument(kind));
  };

  const extractions = await Promise.all([
    extract('identity_card'),
    extract('bank_statement'),
    extract('employment_letter'),
    extract('resume'),
    extract('assets_liabilities'),
    extract('credit_report'),
  ]);

  const assembler = new ApplicationAssembler(applicationId);
  for (const extraction of extractions) {
    assembler.addDocument(extraction);
  }
  const extraction = assembler.build({ groundTruth: options.groundTruth, referenceDate });

  const findings = validateApplication(extraction, referenceDate);
  const validation = aggregateScores(extraction, findings);
  const summary = toValidationSummary(validation);
  const decision = decideFromSummary(summary, options.model ?? new FeatureWeightApproximation());

  log.info(
    {
      event: 'application_assessed',
      verificationStatus: extraction.verificationStatus,
      validationStatus: validation.validationStatus,
      findings: findings.length,
      decision: decision.finalDecision,
    },
    'Application assessed'
  );

  return { applicationId, extraction, validation, summary, decision };
}

/**
 * Assesses every application directory under `root` (or only `applicationIds`), in sorted order.
 */
export async function assessBatch(
  root: string,
  options: AssessmentOptions & { applicationIds?: readonly string[] } = {}
): Promise<BatchAssessment> {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const ids = options.applicationIds ? [...options.applicationIds].sort() : await listApplicationIds(root);

  const assessments = await mapWithConcurrency(ids, config.maxConcurrentApplications, (id) =>
    assessApplication(path.join(root, id), id, options)
  );

  return {
    assessments,
    summary: summarizeDecisions(assessments.map((a) => a.decision)),
  };
}
