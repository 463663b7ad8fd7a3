/**
 * Shared fixtures for the assessment tests: a complete, internally consistent
 * application and the decoded documents it was built from.
 */

import type { DecodedContent, DocumentDecoder } from '../decoders/documentDecoder.js';
import type { ValidationSummary } from '../assessment/validationSummary.js';
import {
  DOCUMENT_KINDS,
  type ApplicationExtraction,
  type DocumentKind,
  type ExtractionMetadata,
} from '../assessment/types.js';

export const REFERENCE_DATE = new Date(2025, 5, 1);

export function metadata(kind: DocumentKind, overrides: Partial<ExtractionMetadata> = {}): ExtractionMetadata {
  return {
    documentKind: kind,
    status: 'success',
    confidence: 0.9,
    errors: [],
    warnings: [],
    processingDurationMs: 0,
    extractionMethod: 'pdf_text',
    sourcePath: `/applications/APP-001/${kind}`,
    ...overrides,
  };
}

function allDocuments(): Record<DocumentKind, ExtractionMetadata> {
  return {
    identity_card: metadata('identity_card'),
    bank_statement: metadata('bank_statement'),
    employment_letter: metadata('employment_letter'),
    resume: metadata('resume'),
    assets_liabilities: metadata('assets_liabilities'),
    credit_report: metadata('credit_report'),
  };
}

/**
 * Complete application with no inconsistencies.
 */
export function baseExtraction(): ApplicationExtraction {
  return {
    applicationId: 'APP-001',
    personalInfo: {
      fullName: 'Omar Khalid Hassan',
      nationalId: '784-1990-12345678-1',
      dateOfBirth: '1990-03-15',
      nationality: 'Jordan',
      maritalStatus: 'married',
      age: 35,
    },
    employmentInfo: {
      employer: 'Gulf Trading LLC',
      jobTitle: 'Senior Accountant',
      startDate: '2020-01-15',
      endDate: null,
      monthlySalary: 12000,
      currency: 'AED',
      employmentStatus: 'active',
    },
    bankStatement: {
      bankName: 'Emirates NBD',
      accountNumber: '101234567890123',
      accountHolder: 'Omar Khalid Hassan',
      periodStart: '2025-01-01',
      periodEnd: '2025-04-01',
      openingBalance: 5000,
      closingBalance: 40200,
      currency: 'AED',
      transactions: [],
      salaryDeposits: [],
      monthlyAverageCredit: 12000,
      monthlyAverageDebit: 266.67,
      monthlyIncome: 12000,
    },
    resume: {
      summary: null,
      workExperience: [],
      education: [],
      skills: ['Accounting'],
      certifications: [],
      yearsOfExperience: 10,
    },
    assetsLiabilities: {
      properties: [],
      vehicles: [],
      savings: [],
      investments: [],
      otherAssets: [],
      loans: [],
      creditCardDebt: [],
      totalAssets: 100000,
      totalLiabilities: 30000,
      netWorth: 70000,
      monthlyDebtPayments: 1500,
      declaredMonthlyIncome: null,
    },
    creditReport: {
      bureauName: 'Al Etihad Credit Bureau',
      reportDate: '2025-05-15',
      score: 720,
      rating: 'Good',
      accounts: [],
      paymentHistory: { onTimePayments: 48, latePayments30Days: 0, latePayments60Days: 0, missedPayments: 0, paymentRatio: 1 },
      totalOutstanding: 30000,
      enquiries: [],
      remarks: null,
    },
    documents: allDocuments(),
    missingDocuments: [],
    verificationStatus: 'verified',
    dataQualityScore: 0.95,
    backfilledFields: [],
  };
}

/**
 * Application with every document missing and nothing extracted.
 */
export function emptyExtraction(applicationId = 'APP-EMPTY'): ApplicationExtraction {
  const documents = allDocuments();
  for (const kind of DOCUMENT_KINDS) {
    documents[kind] = metadata(kind, { status: 'missing', confidence: 0, extractionMethod: 'none', sourcePath: null });
  }
  return {
    ...baseExtraction(),
    applicationId,
    personalInfo: { fullName: null, nationalId: null, dateOfBirth: null, nationality: null, maritalStatus: null, age: null },
    employmentInfo: {
      employer: null,
      jobTitle: null,
      startDate: null,
      endDate: null,
      monthlySalary: null,
      currency: 'AED',
      employmentStatus: null,
    },
    bankStatement: null,
    resume: null,
    assetsLiabilities: null,
    creditReport: null,
    documents,
    missingDocuments: [...DOCUMENT_KINDS],
    verificationStatus: 'incomplete',
    dataQualityScore: 0,
  };
}

export function summary(overrides: Partial<ValidationSummary> = {}): ValidationSummary {
  return {
    application_id: 'APP-001',
    quality_score: 1,
    consistency_score: 1,
    completeness_score: 1,
    category_scores: { personal_info: 1, employment: 1, income: 1, assets: 1, credit: 1 },
    findings: [],
    documents_reviewed: 6,
    validation_status: 'passed',
    ...overrides,
  };
}

// --- Decoded documents ---

export const IDENTITY_CARD_TEXT = [
  'UNITED ARAB EMIRATES',
  'FEDERAL AUTHORITY FOR IDENTITY',
  'Resident Identity Card',
  'ID Number: 784-1990-12345678-1',
  'Name: Omar Khalid Hassan',
  'Date of Birth: 15/03/1990',
  'Nationality: Jordanian',
].join('\n');

export const BANK_STATEMENT_TEXT = [
  'Emirates NBD',
  'Account Statement',
  'Account Holder: Omar Khalid Hassan',
  'Account Number: 101234567890123',
  'Statement Period: 2025-01-01 to 2025-04-01',
  'Opening Balance: AED 5,000.00',
  '2025-01-25 Salary Transfer WPS 12,000.00 17,000.00',
  '2025-02-03 DEWA Utility Payment -800.00 16,200.00',
  '2025-02-25 Salary Transfer WPS 12,000.00 28,200.00',
  '2025-03-25 Salary Transfer WPS 12,000.00 40,200.00',
  'Closing Balance: AED 40,200.00',
].join('\n');

export const EMPLOYMENT_LETTER_TEXT = [
  'GULF TRADING LLC',
  'Date: 2025-05-20',
  'TO WHOM IT MAY CONCERN',
  'This is to certify that Mr. Omar Khalid Hassan is an employee of Gulf Trading LLC.',
  'Position: Senior Accountant',
  'Date of Joining: 15/01/2020',
  'Monthly Salary: AED 12,000.00',
].join('\n');

export const RESUME_TEXT = [
  'Omar Khalid Hassan',
  'Professional Summary',
  'Accountant with ten years of experience.',
  'Work Experience',
  'Senior Accountant',
  'Gulf Trading LLC',
  'Jan 2020 - Present',
  'Accountant',
  'Desert Retail Co',
  '2015 - 2019',
  'Education',
  'Bachelor of Commerce',
  'University of Jordan (2014)',
  'Skills',
  'Accounting, IFRS, Excel',
].join('\n');

export const ASSET_SHEETS: DecodedContent = {
  format: 'spreadsheet',
  sheets: [
    {
      name: 'Assets',
      rows: [
        ['Category', 'Description', 'Value (AED)'],
        ['Savings', 'Bank savings', 40000],
        ['Vehicle', 'Toyota Camry', 60000],
        ['Total Assets', null, 100000],
      ],
    },
    {
      name: 'Liabilities',
      rows: [
        ['Category', 'Description', 'Amount', 'Monthly Payment', 'Remaining Years'],
        ['Auto Loan', 'Car financing', 30000, 1500, 2],
      ],
    },
  ],
};

export const CREDIT_REPORT_JSON = JSON.stringify({
  bureau_name: 'Al Etihad Credit Bureau',
  report_date: '2025-05-15',
  credit_score: 720,
  credit_rating: 'Good',
  credit_accounts: [
    { account_type: 'Auto Loan', institution: 'Emirates NBD', account_status: 'Active', balance: 30000, credit_limit: null },
  ],
  payment_history: {
    on_time_payments: 48,
    late_payments_30_days: 1,
    late_payments_60_days: 0,
    missed_payments: 0,
    payment_ratio: 0.98,
  },
  total_outstanding: 30000,
  enquiries: [],
});

export function pdfText(text: string): DecodedContent {
  return { format: 'pdf', text, tableRows: [], pageCount: 1 };
}

/** Decoded content for each conventional filename of a complete application. */
export const DECODED_BY_FILENAME: Record<string, DecodedContent> = {
  'emirates_id.png': { format: 'image', text: IDENTITY_CARD_TEXT },
  'bank_statement.pdf': pdfText(BANK_STATEMENT_TEXT),
  'employment_letter.pdf': pdfText(EMPLOYMENT_LETTER_TEXT),
  'resume.pdf': pdfText(RESUME_TEXT),
  'assets_liabilities.xlsx': ASSET_SHEETS,
  'credit_report.json': { format: 'json', raw: CREDIT_REPORT_JSON },
};

/**
 * In-memory decoder keyed by file basename; unknown files fail like unreadable ones.
 */
export class FakeDecoder implements DocumentDecoder {
  readonly calls: string[] = [];

  constructor(private readonly contents: Record<string, DecodedContent>) {}

  async decode(filePath: string): Promise<DecodedContent> {
    const name = filePath.split(/[\\/]/).pop() ?? filePath;
    this.calls.push(name);
    const content = this.contents[name];
    if (!content) throw new Error(`No fixture for ${name}`);
    return content;
  }
}
