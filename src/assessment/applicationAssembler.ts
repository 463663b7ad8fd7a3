/**
 * Application Assembler
 *
 * Collects the six per-document extraction outcomes for one applicant and
 * builds the ApplicationExtraction aggregate.
 *
 * Precedence for personal fields:
 * - Identity card values always win.
 * - Ground truth only fills fields that are still null after assembly, and
 *   the quality score is computed before that happens.
 */

import { differenceInYears, isValid, parseISO } from 'date-fns';
import type { DocumentExtraction } from '../extractors/index.js';
import { missingDocument } from '../extractors/index.js';
import type { GroundTruthLookup } from './groundTruth.js';
import {
  DOCUMENT_KINDS,
  type ApplicationExtraction,
  type AssetsLiabilities,
  type BankStatement,
  type CreditReport,
  type DocumentKind,
  type EmploymentInfo,
  type ExtractionMetadata,
  type IdentityCardFields,
  type PersonalInfo,
  type Resume,
  type VerificationStatus,
} from './types.js';
import { clamp01, roundTo } from './validators.js';

export type AnyDocumentExtraction = { [K in DocumentKind]: DocumentExtraction<K> }[DocumentKind];

export interface AssembleOptions {
  groundTruth?: GroundTruthLookup;
  /** Date that ages are computed against. */
  referenceDate: Date;
}

const BACKFILL_ORDER = ['fullName', 'nationalId', 'dateOfBirth', 'nationality', 'maritalStatus', 'age'] as const;

export function emptyEmploymentInfo(): EmploymentInfo {
  return {
    employer: null,
    jobTitle: null,
    startDate: null,
    endDate: null,
    monthlySalary: null,
    currency: 'AED',
    employmentStatus: null,
  };
}

/**
 * Whole years between an ISO birth date and the reference date.
 */
export function ageOn(dateOfBirth: string | null, referenceDate: Date): number | null {
  if (!dateOfBirth) return null;
  const dob = parseISO(dateOfBirth);
  if (!isValid(dob)) return null;
  return differenceInYears(referenceDate, dob);
}

function fractionPresent(values: readonly unknown[]): number {
  return values.filter((value) => value !== null && value !== undefined).length / values.length;
}

/**
 * Builds an ApplicationExtraction from per-document results
 */
export class ApplicationAssembler {
  private readonly applicationId: string;
  private readonly metadata: Partial<Record<DocumentKind, ExtractionMetadata>> = {};
  private identity: IdentityCardFields | null = null;
  private employment: EmploymentInfo | null = null;
  private bankStatement: BankStatement | null = null;
  private resume: Resume | null = null;
  private assetsLiabilities: AssetsLiabilities | null = null;
  private creditReport: CreditReport | null = null;

  constructor(applicationId: string) {
    this.applicationId = applicationId;
  }

  /**
   * Records one document's outcome. Adding the same kind twice replaces it.
   */
  addDocument(extraction: AnyDocumentExtraction): this {
    this.metadata[extraction.kind] = extraction.metadata;

    switch (extraction.kind) {
      case 'identity_card':
        this.identity = extraction.fields;
        break;
      case 'bank_statement':
        this.bankStatement = extraction.fields;
        break;
      case 'employment_letter':
        this.employment = extraction.fields;
        break;
      case 'resume':
        this.resume = extraction.fields;
        break;
      case 'assets_liabilities':
        this.assetsLiabilities = extraction.fields;
        break;
      case 'credit_report':
        this.creditReport = extraction.fields;
        break;
    }
    return this;
  }

  build(options: AssembleOptions): ApplicationExtraction {
    const documents: Record<DocumentKind, ExtractionMetadata> = {
      identity_card: this.metadataFor('identity_card'),
      bank_statement: this.metadataFor('bank_statement'),
      employment_letter: this.metadataFor('employment_letter'),
      resume: this.metadataFor('resume'),
      assets_liabilities: this.metadataFor('assets_liabilities'),
      credit_report: this.metadataFor('credit_report'),
    };

    const missingDocuments = DOCUMENT_KINDS.filter((kind) => documents[kind].status === 'missing');
    const present = DOCUMENT_KINDS.filter((kind) => documents[kind].status !== 'missing');

    const personalInfo: PersonalInfo = {
      fullName: this.identity?.fullName ?? null,
      nationalId: this.identity?.nationalId ?? null,
      dateOfBirth: this.identity?.dateOfBirth ?? null,
      nationality: this.identity?.nationality ?? null,
      maritalStatus: null,
      age: ageOn(this.identity?.dateOfBirth ?? null, options.referenceDate),
    };
    const employmentInfo = this.employment ? { ...this.employment } : emptyEmploymentInfo();

    const meanConfidence = present.length > 0
      ? present.reduce((total, kind) => total + documents[kind].confidence, 0) / present.length
      : 0;
    const dataQualityScore = clamp01(roundTo((
      present.length / DOCUMENT_KINDS.length +
      meanConfidence +
      fractionPresent([personalInfo.fullName, personalInfo.nationalId, personalInfo.dateOfBirth]) +
      fractionPresent([employmentInfo.employer, employmentInfo.jobTitle, employmentInfo.monthlySalary])
    ) / 4, 4));
    const backfilledFields = this.backfill(personalInfo, options);

    return {
      applicationId: this.applicationId,
      personalInfo,
      employmentInfo,
      bankStatement: this.bankStatement,
      resume: this.resume,
      assetsLiabilities: this.assetsLiabilities,
      creditReport: this.creditReport,
      documents,
      missingDocuments,
      verificationStatus: this.verificationStatus(documents, missingDocuments),
      dataQualityScore,
      backfilledFields,
    };
  }

  private metadataFor(kind: DocumentKind): ExtractionMetadata {
    return this.metadata[kind] ?? missingDocument(kind).metadata;
  }

  private verificationStatus(
    documents: Record<DocumentKind, ExtractionMetadata>,
    missing: readonly DocumentKind[]
  ): VerificationStatus {
    if (missing.length > 0) return 'incomplete';
    return DOCUMENT_KINDS.every((kind) => documents[kind].status === 'success') ? 'verified' : 'incomplete';
  }

  /**
   * Fills still-null personal fields in place and returns their names.
   */
  private backfill(personal: PersonalInfo, options: AssembleOptions): (keyof PersonalInfo)[] {
    const record = options.groundTruth?.get(this.applicationId);
    if (!record) return [];

    const filled: (keyof PersonalInfo)[] = [];
    for (const field of BACKFILL_ORDER) {
      if (personal[field] !== null) continue;
      switch (field) {
        case 'age':
          personal.age = record.age ?? ageOn(personal.dateOfBirth, options.referenceDate);
          break;
        case 'maritalStatus':
          personal.maritalStatus = record.maritalStatus;
          break;
        default:
          personal[field] = record[field];
      }
      if (personal[field] !== null) filled.push(field);
    }
    return filled;
  }
}
