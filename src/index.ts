export * from './assessment/types.js';
export * from './assessment/severity.js';
export * from './assessment/validators.js';
export { ApplicationAssembler, ageOn, type AnyDocumentExtraction, type AssembleOptions } from './assessment/applicationAssembler.js';
export {
  validateApplication,
  validateAssets,
  validateCredit,
  validateEmployment,
  validateIncome,
  validatePersonalInfo,
  incomeVariance,
} from './assessment/consistencyValidator.js';
export { aggregateScores } from './assessment/scoreAggregator.js';
export {
  parseDecisionInput,
  serializeDecision,
  serializeDecisionSummary,
  serializeExtraction,
  toValidationSummary,
  type DecisionOutput,
  type ValidationFindingWire,
  type ValidationSummary,
} from './assessment/validationSummary.js';
export { FeatureWeightApproximation, type ConfidenceModel, type ConfidencePrediction } from './assessment/confidenceModel.js';
export { DecisionEngine, decideFromSummary, evaluateBusinessRules, summarizeDecisions } from './assessment/decisionEngine.js';
export { groundTruthFromRows, loadGroundTruth, type GroundTruthLookup, type GroundTruthRecord } from './assessment/groundTruth.js';
export { assessApplication, assessBatch, type ApplicationAssessment, type AssessmentOptions, type BatchAssessment } from './assessment/pipeline.js';
export { FileDocumentDecoder, DocumentDecodeError, type DecodedContent, type DocumentDecoder } from './decoders/documentDecoder.js';
export { createFieldExtractors, runExtraction, type DocumentExtraction, type FieldExtractors } from './extractors/index.js';
export { locateDocuments, listApplicationIds } from './triage/documentLocator.js';
export { loadPipelineConfig, type PipelineConfig } from './core/config.js';
export { DocumentTimeoutError } from './utils/timeout.js';
