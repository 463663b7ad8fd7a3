/**
 * Assessment Domain Types
 *
 * Shapes shared by the extraction, validation and decision stages.
 * Dates are ISO strings (YYYY-MM-DD); monetary amounts are AED unless a
 * currency field says otherwise.
 */

import type { Severity } from './severity.js';

// --- Documents ---

export const DOCUMENT_KINDS = [
  'identity_card',
  'bank_statement',
  'employment_letter',
  'resume',
  'assets_liabilities',
  'credit_report',
] as const;

export type DocumentKind = typeof DOCUMENT_KINDS[number];

export type ExtractionStatus = 'success' | 'partial' | 'failed' | 'missing';

export type ExtractionMethod =
  | 'pdf_text'
  | 'pdf_table'
  | 'ocr_text'
  | 'spreadsheet'
  | 'json'
  | 'none';

export interface ExtractionMetadata {
  documentKind: DocumentKind;
  status: ExtractionStatus;
  confidence: number;          // 0–1
  errors: string[];
  warnings: string[];
  processingDurationMs: number;
  extractionMethod: ExtractionMethod;
  sourcePath: string | null;
}

// --- Personal / Employment ---

export type MaritalStatus = 'single' | 'married' | 'divorced' | 'widowed' | 'separated';

export interface PersonalInfo {
  fullName: string | null;
  nationalId: string | null;
  dateOfBirth: string | null;
  nationality: string | null;
  maritalStatus: MaritalStatus | null;
  age: number | null;
}

/** Fields an identity card can carry. Marital status and age come from elsewhere. */
export type IdentityCardFields = Pick<PersonalInfo, 'fullName' | 'nationalId' | 'dateOfBirth' | 'nationality'>;

export interface EmploymentInfo {
  employer: string | null;
  jobTitle: string | null;
  startDate: string | null;
  endDate: string | null;
  monthlySalary: number | null;
  currency: string;
  employmentStatus: 'active' | 'ended' | null;
}

// --- Bank Statement ---

export type TransactionType = 'credit' | 'debit';

export interface BankTransaction {
  date: string;
  description: string;
  amount: number;              // always >= 0, direction is in `type`
  type: TransactionType;
  runningBalance: number | null;
}

export interface BankStatement {
  bankName: string | null;
  accountNumber: string | null;
  accountHolder: string | null;
  periodStart: string | null;
  periodEnd: string | null;
  openingBalance: number | null;
  closingBalance: number | null;
  currency: string;
  transactions: BankTransaction[];
  salaryDeposits: BankTransaction[];
  monthlyAverageCredit: number;
  monthlyAverageDebit: number;
  /** Salary deposits per month covered by the statement; null without salary deposits. */
  monthlyIncome: number | null;
}

// --- Resume ---

export interface WorkExperience {
  jobTitle: string;
  employer: string | null;
  startDate: string | null;
  endDate: string | null;
  isCurrent: boolean;
}

export interface Education {
  degree: string;
  institution: string | null;
  graduationYear: number | null;
}

export interface Resume {
  summary: string | null;
  workExperience: WorkExperience[];
  education: Education[];
  skills: string[];
  certifications: string[];
  yearsOfExperience: number | null;
}

// --- Assets & Liabilities ---

export interface AssetItem {
  category: string;
  description: string;
  value: number;
}

export interface LiabilityItem {
  category: string;
  description: string;
  amountRemaining: number;
  monthlyPayment: number | null;
  remainingMonths: number | null;
}

export interface AssetsLiabilities {
  properties: AssetItem[];
  vehicles: AssetItem[];
  savings: AssetItem[];
  investments: AssetItem[];
  otherAssets: AssetItem[];
  loans: LiabilityItem[];
  creditCardDebt: LiabilityItem[];
  totalAssets: number;
  totalLiabilities: number;
  netWorth: number;
  monthlyDebtPayments: number;
  declaredMonthlyIncome: number | null;
}

// --- Credit Report ---

export interface CreditAccount {
  accountType: string;
  institution: string | null;
  status: string | null;
  balance: number;
  creditLimit: number | null;
  lastPaymentAmount: number | null;
  isDelinquent: boolean;
}

export interface PaymentHistory {
  onTimePayments: number;
  latePayments30Days: number;
  latePayments60Days: number;
  missedPayments: number;
  paymentRatio: number | null;
}

export interface CreditEnquiry {
  date: string | null;
  type: string | null;
  institution: string | null;
}

export interface CreditReport {
  bureauName: string | null;
  reportDate: string | null;
  score: number | null;
  rating: string | null;
  accounts: CreditAccount[];
  paymentHistory: PaymentHistory;
  totalOutstanding: number | null;
  enquiries: CreditEnquiry[];
  remarks: string | null;
}

// --- Aggregate ---

export type VerificationStatus = 'verified' | 'incomplete' | 'conflicted' | 'suspicious';

/** Typed fields produced by each document kind's extractor. */
export interface DocumentFieldsByKind {
  identity_card: IdentityCardFields;
  bank_statement: BankStatement;
  employment_letter: EmploymentInfo;
  resume: Resume;
  assets_liabilities: AssetsLiabilities;
  credit_report: CreditReport;
}

export interface ApplicationExtraction {
  applicationId: string;
  personalInfo: PersonalInfo;
  employmentInfo: EmploymentInfo;
  bankStatement: BankStatement | null;
  resume: Resume | null;
  assetsLiabilities: AssetsLiabilities | null;
  creditReport: CreditReport | null;
  documents: Record<DocumentKind, ExtractionMetadata>;
  missingDocuments: DocumentKind[];
  verificationStatus: VerificationStatus;
  dataQualityScore: number;
  /** Personal fields filled from the ground-truth record rather than a document. */
  backfilledFields: (keyof PersonalInfo)[];
}

// --- Validation ---

export const SCORED_CATEGORIES = ['personal_info', 'employment', 'income', 'assets', 'credit'] as const;

export type ScoredCategory = typeof SCORED_CATEGORIES[number];

export type FindingCategory = ScoredCategory | 'business_rule' | 'decision';

export interface ValidationFinding {
  category: FindingCategory;
  severity: Severity;
  message: string;
  fieldsInvolved: string[];
  affectedDocuments: DocumentKind[];
  autoResolvable: boolean;
  suggestedResolution?: string;
}

export type ValidationStatus = 'passed' | 'passed_with_warnings' | 'needs_review' | 'failed';

export type CategoryScores = Record<ScoredCategory, number>;

export interface ValidationResult {
  applicationId: string;
  consistencyScore: number;
  completenessScore: number;
  qualityScore: number;
  categoryScores: CategoryScores;
  findings: ValidationFinding[];
  validationStatus: ValidationStatus;
  documentsReviewed: number;
}

// --- Decision ---

export type FinalDecision = 'APPROVE' | 'DENY' | 'NEEDS_REVIEW';

export type ConfidenceLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type CriticalFlag = 'FAILED_BUSINESS_RULES' | 'INSUFFICIENT_DATA_QUALITY';

export interface DecisionScore {
  validationScore: number;
  mlConfidence: number;
  businessRuleScore: number;
  combinedScore: number;
  approvalLikelihood: number;
}

export interface DecisionFinding {
  category: FindingCategory;
  severity: Severity;
  message: string;
  weight: number;
}

export interface DecisionResult {
  applicationId: string;
  finalDecision: FinalDecision;
  decisionScores: DecisionScore;
  findings: DecisionFinding[];
  rationale: string;
  confidenceLevel: ConfidenceLevel;
  appealsEligible: boolean;
  recommendedActions: string[];
  criticalFlags: CriticalFlag[];
  /** 0 or 1, or -1 when no prediction was made. */
  mlPredictionClass: number;
  mlPredictionProbability: number;
  validationStatus: string;
}

export interface DecisionSummary {
  totalApplications: number;
  decisions: Record<FinalDecision, { count: number; percentage: number }>;
  confidenceDistribution: Record<ConfidenceLevel, number>;
  averageScores: {
    validationScore: number;
    mlConfidence: number;
    combinedScore: number;
  };
  appealsEligible: number;
}
