/**
 * Cross-document consistency checks.
 *
 * Each checker is a pure function of the assembled application and returns
 * findings only; nothing here throws on bad data.
 */

import { differenceInDays, isValid, parseISO } from 'date-fns';
import { compareNames } from '../core/nameMatching.js';
import type { Severity } from './severity.js';
import type { ApplicationExtraction, DocumentKind, ScoredCategory, ValidationFinding } from './types.js';
import { isValidNationalId, roundTo } from './validators.js';

export const MINIMUM_AGE = 18;
export const MAXIMUM_PLAUSIBLE_AGE = 100;
export const MINIMUM_EMPLOYMENT_DAYS = 90;
export const LOW_INCOME_THRESHOLD = 1000;
export const HIGH_NET_WORTH_THRESHOLD = 500_000;
export const DEBT_BURDEN_THRESHOLD = -100_000;
export const MAX_PROPERTIES = 5;
export const POOR_CREDIT_SCORE = 300;
export const FAIR_CREDIT_SCORE = 600;

/** Income variance bands, checked highest first. */
export const INCOME_VARIANCE_BANDS: readonly { minimum: number; severity: Severity }[] = [
  { minimum: 0.3, severity: 'high' },
  { minimum: 0.15, severity: 'medium' },
];

interface FindingInput {
  severity: Severity;
  message: string;
  fieldsInvolved: string[];
  affectedDocuments: DocumentKind[];
  autoResolvable?: boolean;
  suggestedResolution?: string;
}

function finding(category: ScoredCategory, input: FindingInput): ValidationFinding {
  const { suggestedResolution, autoResolvable = false, ...rest } = input;
  return {
    category,
    ...rest,
    autoResolvable,
    ...(suggestedResolution !== undefined ? { suggestedResolution } : {}),
  };
}

export function formatAed(amount: number): string {
  return `AED ${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function toDate(value: string | null): Date | null {
  if (!value) return null;
  const date = parseISO(value);
  return isValid(date) ? date : null;
}

// --- Personal ---

const REQUIRED_PERSONAL_FIELDS = [
  { field: 'fullName', label: 'full name' },
  { field: 'nationalId', label: 'national ID' },
  { field: 'dateOfBirth', label: 'date of birth' },
] as const;

export function validatePersonalInfo(extraction: ApplicationExtraction): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const personal = extraction.personalInfo;

  for (const { field, label } of REQUIRED_PERSONAL_FIELDS) {
    if (personal[field] === null) {
      findings.push(finding('personal_info', {
        severity: 'high',
        message: `Missing required personal field: ${label}`,
        fieldsInvolved: [`personal_info.${field}`],
        affectedDocuments: ['identity_card'],
      }));
    }
  }

  if (personal.nationalId !== null && !isValidNationalId(personal.nationalId)) {
    findings.push(finding('personal_info', {
      severity: 'medium',
      message: `National ID ${personal.nationalId} does not match the DDD-DDDD-DDDDDDDD-D format`,
      fieldsInvolved: ['personal_info.nationalId'],
      affectedDocuments: ['identity_card'],
    }));
  }

  if (personal.age !== null) {
    if (personal.age < MINIMUM_AGE) {
      findings.push(finding('personal_info', {
        severity: 'critical',
        message: `Applicant age ${personal.age} is below the minimum age of ${MINIMUM_AGE}`,
        fieldsInvolved: ['personal_info.age', 'personal_info.dateOfBirth'],
        affectedDocuments: ['identity_card'],
      }));
    } else if (personal.age > MAXIMUM_PLAUSIBLE_AGE) {
      findings.push(finding('personal_info', {
        severity: 'medium',
        message: `Applicant age ${personal.age} is above ${MAXIMUM_PLAUSIBLE_AGE}; date of birth is likely misread`,
        fieldsInvolved: ['personal_info.age', 'personal_info.dateOfBirth'],
        affectedDocuments: ['identity_card'],
        autoResolvable: true,
        suggestedResolution: 'Re-read the date of birth from the identity card',
      }));
    }
  }

  const holder = extraction.bankStatement?.accountHolder ?? null;
  if (personal.fullName !== null && holder !== null) {
    const match = compareNames(personal.fullName, holder);
    if (!match.isMatch) {
      findings.push(finding('personal_info', {
        severity: 'low',
        message: `Name on identity card "${personal.fullName}" differs from bank account holder "${holder}" (similarity ${match.similarity}%)`,
        fieldsInvolved: ['personal_info.fullName', 'bank_statement.accountHolder'],
        affectedDocuments: ['identity_card', 'bank_statement'],
        autoResolvable: true,
        suggestedResolution: 'Use the identity card name as the canonical name',
      }));
    }
  }

  return findings;
}

// --- Employment ---

export function validateEmployment(extraction: ApplicationExtraction, referenceDate: Date): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const employment = extraction.employmentInfo;

  if (employment.employer === null) {
    findings.push(finding('employment', {
      severity: 'high',
      message: 'Employer could not be determined',
      fieldsInvolved: ['employment_info.employer'],
      affectedDocuments: ['employment_letter'],
    }));
  }
  if (employment.jobTitle === null) {
    findings.push(finding('employment', {
      severity: 'medium',
      message: 'Job title could not be determined',
      fieldsInvolved: ['employment_info.jobTitle'],
      affectedDocuments: ['employment_letter'],
    }));
  }

  const start = toDate(employment.startDate);
  const end = toDate(employment.endDate);
  if (start && end && end < start) {
    findings.push(finding('employment', {
      severity: 'critical',
      message: `Employment end date ${employment.endDate} is before start date ${employment.startDate}`,
      fieldsInvolved: ['employment_info.startDate', 'employment_info.endDate'],
      affectedDocuments: ['employment_letter'],
    }));
  } else if (start) {
    const days = differenceInDays(end ?? referenceDate, start);
    if (days < MINIMUM_EMPLOYMENT_DAYS) {
      findings.push(finding('employment', {
        severity: 'medium',
        message: `Employment duration of ${Math.max(0, days)} days is below ${MINIMUM_EMPLOYMENT_DAYS} days`,
        fieldsInvolved: ['employment_info.startDate', 'employment_info.endDate'],
        affectedDocuments: ['employment_letter'],
      }));
    }
  }

  return findings;
}

// --- Income ---

/**
 * Relative difference of two incomes, rounded to 4 decimals. Symmetric in its arguments.
 */
export function incomeVariance(a: number, b: number): number {
  const larger = Math.max(Math.abs(a), Math.abs(b));
  if (larger === 0) return 0;
  return roundTo(Math.abs(a - b) / larger, 4);
}

export function varianceSeverity(variance: number): Severity | null {
  return INCOME_VARIANCE_BANDS.find((band) => variance >= band.minimum)?.severity ?? null;
}

export function validateIncome(extraction: ApplicationExtraction): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const salary = extraction.employmentInfo.monthlySalary;
  const bankIncome = extraction.bankStatement?.monthlyIncome ?? null;
  const fieldsInvolved = ['employment_info.monthlySalary', 'bank_statement.monthlyIncome'];
  const affectedDocuments: DocumentKind[] = ['employment_letter', 'bank_statement'];

  if (salary === null && bankIncome === null) {
    findings.push(finding('income', {
      severity: 'critical',
      message: 'No income could be established from the employment letter or bank statement',
      fieldsInvolved,
      affectedDocuments,
    }));
    return findings;
  }

  if (salary !== null && bankIncome !== null) {
    const variance = incomeVariance(salary, bankIncome);
    const severity = varianceSeverity(variance);
    const detail = `stated salary ${formatAed(salary)} vs bank-derived income ${formatAed(bankIncome)} (variance ${(variance * 100).toFixed(1)}%)`;
    if (severity === 'high') {
      findings.push(finding('income', {
        severity,
        message: `Income mismatch: ${detail}`,
        fieldsInvolved,
        affectedDocuments,
      }));
    } else if (severity === 'medium') {
      findings.push(finding('income', {
        severity,
        message: `Income variance: ${detail}`,
        fieldsInvolved,
        affectedDocuments,
        autoResolvable: true,
        suggestedResolution: `Use the average monthly income of ${formatAed(roundTo((salary + bankIncome) / 2, 2))}`,
      }));
    }
  }

  const derived = bankIncome ?? salary;
  if (derived !== null && derived < LOW_INCOME_THRESHOLD) {
    findings.push(finding('income', {
      severity: 'info',
      message: `Low monthly income: ${formatAed(derived)}`,
      fieldsInvolved,
      affectedDocuments,
    }));
  }

  return findings;
}

// --- Assets ---

export function validateAssets(extraction: ApplicationExtraction): ValidationFinding[] {
  const assets = extraction.assetsLiabilities;
  if (!assets) {
    return [finding('assets', {
      severity: 'medium',
      message: 'Assets and liabilities data missing',
      fieldsInvolved: ['assets_liabilities'],
      affectedDocuments: ['assets_liabilities'],
    })];
  }

  const findings: ValidationFinding[] = [];
  if (assets.netWorth > HIGH_NET_WORTH_THRESHOLD) {
    findings.push(finding('assets', {
      severity: 'medium',
      message: `High net worth of ${formatAed(assets.netWorth)} may disqualify the applicant`,
      fieldsInvolved: ['assets_liabilities.netWorth'],
      affectedDocuments: ['assets_liabilities'],
    }));
  } else if (assets.netWorth < DEBT_BURDEN_THRESHOLD) {
    findings.push(finding('assets', {
      severity: 'high',
      message: `High debt burden: net worth ${formatAed(assets.netWorth)}`,
      fieldsInvolved: ['assets_liabilities.netWorth', 'assets_liabilities.totalLiabilities'],
      affectedDocuments: ['assets_liabilities'],
    }));
  }

  if (assets.properties.length > MAX_PROPERTIES) {
    findings.push(finding('assets', {
      severity: 'low',
      message: `${assets.properties.length} properties declared (more than ${MAX_PROPERTIES})`,
      fieldsInvolved: ['assets_liabilities.properties'],
      affectedDocuments: ['assets_liabilities'],
    }));
  }

  return findings;
}

// --- Credit ---

export function validateCredit(extraction: ApplicationExtraction): ValidationFinding[] {
  const credit = extraction.creditReport;
  if (!credit || credit.score === null) {
    return [finding('credit', {
      severity: 'medium',
      message: credit ? 'Credit score missing from credit report' : 'Credit report data missing',
      fieldsInvolved: ['credit_report.score'],
      affectedDocuments: ['credit_report'],
    })];
  }

  const findings: ValidationFinding[] = [];
  if (credit.score < POOR_CREDIT_SCORE) {
    findings.push(finding('credit', {
      severity: 'high',
      message: `Very low credit score: ${credit.score}`,
      fieldsInvolved: ['credit_report.score'],
      affectedDocuments: ['credit_report'],
    }));
  } else if (credit.score < FAIR_CREDIT_SCORE) {
    findings.push(finding('credit', {
      severity: 'medium',
      message: `Low credit score: ${credit.score}`,
      fieldsInvolved: ['credit_report.score'],
      affectedDocuments: ['credit_report'],
    }));
  }

  const delinquent = credit.accounts.filter((account) => account.isDelinquent);
  if (delinquent.length > 0) {
    findings.push(finding('credit', {
      severity: 'high',
      message: `${delinquent.length} delinquent credit account(s): ${delinquent.map((a) => a.accountType).join(', ')}`,
      fieldsInvolved: ['credit_report.accounts'],
      affectedDocuments: ['credit_report'],
    }));
  }

  return findings;
}

/**
 * All checks, in category order: personal, employment, income, assets, credit.
 */
export function validateApplication(extraction: ApplicationExtraction, referenceDate: Date): ValidationFinding[] {
  return [
    ...validatePersonalInfo(extraction),
    ...validateEmployment(extraction, referenceDate),
    ...validateIncome(extraction),
    ...validateAssets(extraction),
    ...validateCredit(extraction),
  ];
}
