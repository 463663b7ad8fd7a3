/**
 * Wire format tests: validation summaries in, decisions out.
 *
 * Run: node --import tsx --test src/tests/testValidationSummary.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { validateApplication } from "../assessment/consistencyValidator.js";
import { aggregateScores } from "../assessment/scoreAggregator.js";
import type { DecisionResult } from "../assessment/types.js";
import {
  parseDecisionInput,
  serializeDecision,
  serializeExtraction,
  toFindingWire,
  toValidationSummary,
} from "../assessment/validationSummary.js";
import { REFERENCE_DATE, baseExtraction, emptyExtraction } from "./fixtures.js";

describe("toValidationSummary", () => {
  it("writes snake_case scores and upper-case severities", () => {
    const extraction = emptyExtraction();
    const summary = toValidationSummary(aggregateScores(extraction, validateApplication(extraction, REFERENCE_DATE)));
    assert.equal(summary.application_id, "APP-EMPTY");
    assert.equal(summary.quality_score, 0.36);
    assert.deepEqual(summary.category_scores, { personal_info: 0.4, employment: 0.5, income: 0, assets: 0.5, credit: 0.5 });
    assert.equal(summary.documents_reviewed, 0);
    assert.equal(summary.validation_status, "failed");
    assert.deepEqual(summary.findings[5], {
      category: "income",
      severity: "CRITICAL",
      message: "No income could be established from the employment letter or bank statement",
      fields_involved: ["employment_info.monthlySalary", "bank_statement.monthlyIncome"],
      affected_documents: ["employment_letter", "bank_statement"],
      auto_resolvable: false,
    });
  });

  it("keeps a suggested resolution", () => {
    const wire = toFindingWire({
      category: "income",
      severity: "medium",
      message: "Income variance",
      fieldsInvolved: [],
      affectedDocuments: ["bank_statement"],
      autoResolvable: true,
      suggestedResolution: "Use the average monthly income of AED 9,250.00",
    });
    assert.equal(wire.severity, "MEDIUM");
    assert.equal(wire.suggested_resolution, "Use the average monthly income of AED 9,250.00");
  });
});

describe("parseDecisionInput", () => {
  const summaries = parseDecisionInput({
    applications: [
      {
        application_id: "APP-002",
        quality_score: 0.8,
        findings: [{ severity: "HIGH", message: "High debt burden: net worth AED -150,000.00" }],
      },
      { quality_score: 1 },
      { application_id: "APP-001", category_scores: null, validation_status: "passed", documents_reviewed: 6 },
    ],
  });

  it("drops entries without an id", () => {
    assert.deepEqual([...summaries.keys()], ["APP-002", "APP-001"]);
  });

  it("defaults absent scores and lists", () => {
    assert.deepEqual(summaries.get("APP-002"), {
      application_id: "APP-002",
      quality_score: 0.8,
      consistency_score: 0,
      completeness_score: 0,
      category_scores: { personal_info: 0, employment: 0, income: 0, assets: 0, credit: 0 },
      findings: [
        {
          category: "",
          severity: "HIGH",
          message: "High debt burden: net worth AED -150,000.00",
          fields_involved: [],
          affected_documents: [],
          auto_resolvable: false,
        },
      ],
      documents_reviewed: 0,
    });
    assert.equal(summaries.get("APP-001")?.validation_status, "passed");
    assert.equal(summaries.get("APP-001")?.documents_reviewed, 6);
  });

  it("accepts a document without applications", () => {
    assert.equal(parseDecisionInput({}).size, 0);
  });

  it("rejects documents of the wrong shape", () => {
    assert.throws(() => parseDecisionInput([]), /^Error: Invalid decision input at \(root\)/);
    assert.throws(() => parseDecisionInput({ applications: "APP-1" }), /^Error: Invalid decision input at applications/);
  });

  it("skips a malformed entry and keeps the rest", () => {
    const parsed = parseDecisionInput({
      applications: [
        { application_id: "APP-1", quality_score: 0.9 },
        { application_id: "APP-2", quality_score: "0.9" },
      ],
    });
    assert.deepEqual([...parsed.keys()], ["APP-1"]);
    assert.equal(parsed.get("APP-1")?.quality_score, 0.9);
  });

  it("treats a null validation status as absent", () => {
    const parsed = parseDecisionInput({
      applications: [{ application_id: "APP-1", quality_score: 0.9, validation_status: null }],
    });
    assert.equal(parsed.size, 1);
    assert.equal(parsed.get("APP-1")?.validation_status, undefined);
  });

  it("treats a null suggested resolution as absent", () => {
    const parsed = parseDecisionInput({
      applications: [
        {
          application_id: "APP-1",
          findings: [{ category: "income", severity: "MEDIUM", message: "Income variance", suggested_resolution: null }],
        },
      ],
    });
    const finding = parsed.get("APP-1")?.findings[0];
    assert.equal(finding?.message, "Income variance");
    assert.equal(finding?.suggested_resolution, undefined);
  });

  it("reads a plain string finding as its message", () => {
    const parsed = parseDecisionInput({
      applications: [{ application_id: "APP-1", findings: ["Employer name differs between documents"] }],
    });
    assert.deepEqual(parsed.get("APP-1")?.findings, [
      {
        category: "",
        severity: "INFO",
        message: "Employer name differs between documents",
        fields_involved: [],
        affected_documents: [],
        auto_resolvable: false,
      },
    ]);
  });
});

describe("serializeDecision", () => {
  it("rounds scores to four decimals and upper-cases severities", () => {
    const decision: DecisionResult = {
      applicationId: "APP-001",
      finalDecision: "NEEDS_REVIEW",
      decisionScores: {
        validationScore: 0.123456,
        mlConfidence: 0.5,
        businessRuleScore: 0.85,
        combinedScore: 0.663549,
        approvalLikelihood: 0.663549,
      },
      findings: [{ category: "business_rule", severity: "high", message: "Quality score 0.75 below preferred threshold 0.85", weight: 0.15 }],
      rationale: "Borderline",
      confidenceLevel: "MEDIUM",
      appealsEligible: true,
      recommendedActions: ["Escalate to human reviewer for additional verification"],
      criticalFlags: [],
      mlPredictionClass: 1,
      mlPredictionProbability: 0.5,
      validationStatus: "needs_review",
    };

    assert.deepEqual(serializeDecision(decision), {
      application_id: "APP-001",
      final_decision: "NEEDS_REVIEW",
      decision_scores: {
        validation_score: 0.1235,
        ml_confidence: 0.5,
        business_rule_score: 0.85,
        combined_score: 0.6635,
        approval_likelihood: 0.6635,
      },
      findings: [{ category: "business_rule", severity: "HIGH", message: "Quality score 0.75 below preferred threshold 0.85", weight: 0.15 }],
      rationale: "Borderline",
      confidence_level: "MEDIUM",
      appeals_eligible: true,
      recommended_actions: ["Escalate to human reviewer for additional verification"],
      critical_flags: [],
      ml_prediction_class: 1,
      ml_prediction_probability: 0.5,
      validation_status: "needs_review",
    });
  });
});

describe("serializeExtraction", () => {
  it("omits source paths and durations from document metadata", () => {
    const serialized = serializeExtraction(baseExtraction());
    assert.deepEqual(serialized.documents, Object.fromEntries(
      ["identity_card", "bank_statement", "employment_letter", "resume", "assets_liabilities", "credit_report"].map((kind) => [
        kind,
        { status: "success", confidence: 0.9, extraction_method: "pdf_text", errors: [], warnings: [] },
      ])
    ));
    assert.equal(serialized.verification_status, "verified");
  });
});
