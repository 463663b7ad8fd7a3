/**
 * Field sanitizer and name matching tests.
 *
 * Run: node --import tsx --test src/tests/testValidators.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  clamp01,
  findDates,
  isValidNationalId,
  normalizeMaritalStatus,
  normalizeNationalId,
  normalizeText,
  parseAmount,
  roundTo,
  sanitizeDate,
} from "../assessment/validators.js";
import { canonicalizeName, compareNames } from "../core/nameMatching.js";

describe("sanitizeDate", () => {
  it("accepts ISO, day-first and month-name dates", () => {
    assert.equal(sanitizeDate("2024-02-29"), "2024-02-29");
    assert.equal(sanitizeDate("15/03/1990"), "1990-03-15");
    assert.equal(sanitizeDate("5 January 2021"), "2021-01-05");
    assert.equal(sanitizeDate("Mar 7, 2019"), "2019-03-07");
  });

  it("rejects impossible or empty values", () => {
    assert.equal(sanitizeDate("31/02/2020"), null);
    assert.equal(sanitizeDate(""), null);
    assert.equal(sanitizeDate(null), null);
    assert.equal(sanitizeDate("yesterday"), null);
  });
});

describe("findDates", () => {
  it("returns dates in document order", () => {
    const text = "Period: 01/04/2025 to 2025-01-01, printed 3 May 2025";
    assert.deepEqual(findDates(text), ["2025-04-01", "2025-01-01", "2025-05-03"]);
  });
});

describe("parseAmount", () => {
  it("strips currency markers and thousands separators", () => {
    assert.equal(parseAmount("AED 8,500.00"), 8500);
    assert.equal(parseAmount("Dhs 1,200"), 1200);
    assert.equal(parseAmount("-45.50"), -45.5);
  });

  it("treats parentheses as negative", () => {
    assert.equal(parseAmount("(1,200.50)"), -1200.5);
  });

  it("returns null for non-numeric text", () => {
    assert.equal(parseAmount("Salary"), null);
    assert.equal(parseAmount(undefined), null);
    assert.equal(parseAmount(Number.NaN), null);
  });
});

describe("national id", () => {
  it("normalizes spaced or undelimited groups", () => {
    assert.equal(normalizeNationalId("784 1990 12345678 1"), "784-1990-12345678-1");
    assert.equal(normalizeNationalId("784199012345678 1"), "784-1990-12345678-1");
  });

  it("only accepts 3-4-8-1 groups as valid", () => {
    assert.equal(isValidNationalId("784-1990-12345678-1"), true);
    assert.equal(isValidNationalId("784-1990-1234567-1"), false);
    assert.equal(isValidNationalId(null), false);
  });
});

describe("small helpers", () => {
  it("normalizeText collapses whitespace and drops empties", () => {
    assert.equal(normalizeText("  Gulf   Trading \n LLC "), "Gulf Trading LLC");
    assert.equal(normalizeText("   "), null);
    assert.equal(normalizeText(42), "42");
  });

  it("normalizeMaritalStatus maps synonyms", () => {
    assert.equal(normalizeMaritalStatus("Widower"), "widowed");
    assert.equal(normalizeMaritalStatus("MARRIED"), "married");
    assert.equal(normalizeMaritalStatus("complicated"), null);
  });

  it("roundTo and clamp01", () => {
    assert.equal(roundTo(0.123456, 4), 0.1235);
    assert.equal(clamp01(1.4), 1);
    assert.equal(clamp01(-0.2), 0);
    assert.equal(clamp01(Number.NaN), 0);
  });
});

describe("compareNames", () => {
  it("ignores honorifics, particles and token order", () => {
    assert.equal(canonicalizeName("Mr. Omar bin Khalid Al-Hassan"), "HASSAN KHALID OMAR");
    const result = compareNames("Omar Khalid Hassan", "HASSAN, OMAR KHALID");
    assert.equal(result.isMatch, true);
    assert.equal(result.matchType, "normalized");
  });

  it("accepts a dropped middle name", () => {
    const result = compareNames("Omar Khalid Hassan", "Omar Hassan");
    assert.equal(result.isMatch, true);
    assert.equal(result.matchType, "token");
    assert.equal(result.similarity, 67);
  });

  it("rejects different people", () => {
    const result = compareNames("Omar Khalid Hassan", "Fatima Saeed");
    assert.equal(result.isMatch, false);
    assert.equal(result.similarity, 0);
  });
});
