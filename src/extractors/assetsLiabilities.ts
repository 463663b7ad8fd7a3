/**
 * Asset & liability workbook extraction.
 *
 * Rows are classified by category keyword. A row counts as a liability when
 * its label names a liability or when it sits on a liabilities sheet; the
 * liability keywords are checked first so "Auto Loan" is a loan, not a vehicle.
 */

import type { AssetItem, AssetsLiabilities, LiabilityItem } from '../assessment/types.js';
import { normalizeText, parseAmount, roundTo } from '../assessment/validators.js';
import type { CellValue, DecodedContent, SheetData } from '../decoders/documentDecoder.js';
import { err, ok, type ExtractorResult } from './extractorResult.js';
import { containsKeyword } from './textFields.js';

export const SPREADSHEET_CONFIDENCE = 0.95;

export const ASSET_CATEGORY_KEYWORDS = {
  properties: ['real estate', 'property', 'properties', 'apartment', 'villa', 'townhouse', 'land', 'house', 'flat'],
  vehicles: ['vehicle', 'car', 'auto', 'motorcycle', 'boat'],
  savings: ['savings', 'liquid', 'cash', 'deposit', 'current account', 'bank account'],
  investments: ['investment', 'stock', 'shares', 'bond', 'fund', 'portfolio', 'gold', 'crypto'],
} as const;

export const LIABILITY_CATEGORY_KEYWORDS = {
  creditCardDebt: ['credit card', 'card balance'],
  loans: ['loan', 'mortgage', 'financing', 'finance', 'debt', 'overdraft'],
} as const;

const TOTAL_ASSETS_REGEX = /^total\s+assets\b/i;
const TOTAL_LIABILITIES_REGEX = /^total\s+liabilities\b/i;
const NET_WORTH_REGEX = /^net\s+worth\b/i;
const MONTHLY_INCOME_REGEX = /^monthly\s+income\b/i;
const LIABILITY_SHEET_REGEX = /liabilit|debt|loan/i;

type AssetBucket = keyof typeof ASSET_CATEGORY_KEYWORDS;
type LiabilityBucket = keyof typeof LIABILITY_CATEGORY_KEYWORDS;

const ASSET_BUCKETS: AssetBucket[] = ['properties', 'vehicles', 'savings', 'investments'];
const LIABILITY_BUCKETS: LiabilityBucket[] = ['creditCardDebt', 'loans'];

interface SheetRow {
  labels: string[];
  numbers: number[];
}

function readRow(cells: readonly CellValue[]): SheetRow {
  const labels: string[] = [];
  const numbers: number[] = [];
  for (const cell of cells) {
    if (cell === null || typeof cell === 'boolean') continue;
    const amount = parseAmount(cell);
    if (amount !== null) {
      numbers.push(amount);
    } else if (numbers.length === 0) {
      const label = normalizeText(String(cell).replace(/:$/, ''));
      if (label) labels.push(label);
    }
  }
  return { labels, numbers };
}

function classifyLiability(label: string): LiabilityBucket | null {
  return LIABILITY_BUCKETS.find((bucket) => containsKeyword(label, LIABILITY_CATEGORY_KEYWORDS[bucket])) ?? null;
}

function classifyAsset(label: string): AssetBucket | null {
  return ASSET_BUCKETS.find((bucket) => containsKeyword(label, ASSET_CATEGORY_KEYWORDS[bucket])) ?? null;
}

interface Accumulator {
  assets: Record<AssetBucket | 'otherAssets', AssetItem[]>;
  liabilities: Record<LiabilityBucket, LiabilityItem[]>;
  explicitTotalAssets: number | null;
  explicitTotalLiabilities: number | null;
  declaredMonthlyIncome: number | null;
}

function collectSheet(sheet: SheetData, acc: Accumulator): void {
  const liabilitySheet = LIABILITY_SHEET_REGEX.test(sheet.name);

  for (const cells of sheet.rows) {
    const { labels, numbers } = readRow(cells);
    if (labels.length === 0 || numbers.length === 0) continue;

    const category = labels[0];
    const description = labels.slice(1).join(' ') || category;
    const value = numbers[0];

    if (TOTAL_ASSETS_REGEX.test(category)) {
      acc.explicitTotalAssets = value;
      continue;
    }
    if (TOTAL_LIABILITIES_REGEX.test(category)) {
      acc.explicitTotalLiabilities = value;
      continue;
    }
    if (MONTHLY_INCOME_REGEX.test(category)) {
      acc.declaredMonthlyIncome = value;
      continue;
    }
    if (NET_WORTH_REGEX.test(category) || /^total\b/i.test(category)) continue;

    const liabilityBucket = classifyLiability(labels.join(' '));
    if (liabilityBucket || liabilitySheet) {
      const remainingYears = numbers.length > 2 ? numbers[2] : null;
      acc.liabilities[liabilityBucket ?? 'loans'].push({
        category,
        description,
        amountRemaining: Math.abs(value),
        monthlyPayment: numbers.length > 1 ? numbers[1] : null,
        remainingMonths: remainingYears !== null ? Math.round(remainingYears * 12) : null,
      });
      continue;
    }

    const assetBucket = classifyAsset(labels.join(' ')) ?? 'otherAssets';
    acc.assets[assetBucket].push({ category, description, value });
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function extractAssetsLiabilities(content: DecodedContent): ExtractorResult<AssetsLiabilities> {
  if (content.format !== 'spreadsheet') {
    return err(`Asset sheet must be a spreadsheet, got ${content.format}`);
  }
  if (!content.sheets.some((sheet) => sheet.rows.length > 0)) {
    return err('Workbook has no non-empty sheet', 'spreadsheet');
  }

  const acc: Accumulator = {
    assets: { properties: [], vehicles: [], savings: [], investments: [], otherAssets: [] },
    liabilities: { loans: [], creditCardDebt: [] },
    explicitTotalAssets: null,
    explicitTotalLiabilities: null,
    declaredMonthlyIncome: null,
  };
  for (const sheet of content.sheets) {
    collectSheet(sheet, acc);
  }

  const assetItems = Object.values(acc.assets).flat();
  const liabilityItems = [...acc.liabilities.loans, ...acc.liabilities.creditCardDebt];
  const totalAssets = acc.explicitTotalAssets ?? sum(assetItems.map((item) => item.value));
  const totalLiabilities = acc.explicitTotalLiabilities ?? sum(liabilityItems.map((item) => item.amountRemaining));

  const fields: AssetsLiabilities = {
    properties: acc.assets.properties,
    vehicles: acc.assets.vehicles,
    savings: acc.assets.savings,
    investments: acc.assets.investments,
    otherAssets: acc.assets.otherAssets,
    loans: acc.liabilities.loans,
    creditCardDebt: acc.liabilities.creditCardDebt,
    totalAssets: roundTo(totalAssets, 2),
    totalLiabilities: roundTo(totalLiabilities, 2),
    netWorth: roundTo(totalAssets - totalLiabilities, 2),
    monthlyDebtPayments: roundTo(sum(liabilityItems.map((item) => item.monthlyPayment ?? 0)), 2),
    declaredMonthlyIncome: acc.declaredMonthlyIncome,
  };

  const warnings: string[] = [];
  if (assetItems.length === 0 && acc.explicitTotalAssets === null) warnings.push('No asset rows recognised');
  if (liabilityItems.length === 0 && acc.explicitTotalLiabilities === null) warnings.push('No liability rows recognised');

  return ok(fields, SPREADSHEET_CONFIDENCE, 'spreadsheet', warnings);
}
