/**
 * End-to-end assessment tests over temporary application folders.
 *
 * Run: node --import tsx --test src/tests/testPipeline.ts
 */

import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { assessApplication, assessBatch } from "../assessment/pipeline.js";
import { serializeDecision, serializeExtraction } from "../assessment/validationSummary.js";
import { DEFAULT_PIPELINE_CONFIG } from "../core/config.js";
import { DECODED_BY_FILENAME, FakeDecoder, REFERENCE_DATE } from "./fixtures.js";

let root: string;

before(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-"));
  await fs.mkdir(path.join(root, "APP-001"));
  await fs.mkdir(path.join(root, "APP-EMPTY"));
  for (const name of Object.keys(DECODED_BY_FILENAME)) {
    await fs.writeFile(path.join(root, "APP-001", name), "");
  }
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function options(decoder = new FakeDecoder(DECODED_BY_FILENAME)) {
  return { decoder, referenceDate: REFERENCE_DATE, now: () => 0 };
}

describe("assessApplication", () => {
  it("approves a complete, consistent application", async () => {
    const decoder = new FakeDecoder(DECODED_BY_FILENAME);
    const result = await assessApplication(path.join(root, "APP-001"), "APP-001", options(decoder));

    assert.deepEqual([...decoder.calls].sort(), Object.keys(DECODED_BY_FILENAME).sort());
    assert.equal(result.extraction.verificationStatus, "verified");
    assert.equal(result.extraction.dataQualityScore, 0.9783);
    assert.deepEqual(result.extraction.personalInfo, {
      fullName: "Omar Khalid Hassan",
      nationalId: "784-1990-12345678-1",
      dateOfBirth: "1990-03-15",
      nationality: "Jordan",
      maritalStatus: null,
      age: 35,
    });
    assert.equal(result.extraction.bankStatement?.monthlyIncome, 12000);
    assert.equal(result.extraction.assetsLiabilities?.netWorth, 70000);

    assert.deepEqual(result.validation.findings, []);
    assert.equal(result.validation.validationStatus, "passed");
    assert.equal(result.summary.quality_score, 1);

    assert.equal(result.decision.finalDecision, "APPROVE");
    assert.equal(result.decision.confidenceLevel, "HIGH");
    assert.equal(result.decision.findings[0]?.message, "Strong approval: validation 1.00 + ML 0.80 + rules 1.00");
  });

  it("denies an application folder with no documents", async () => {
    const decoder = new FakeDecoder(DECODED_BY_FILENAME);
    const result = await assessApplication(path.join(root, "APP-EMPTY"), "APP-EMPTY", options(decoder));

    assert.deepEqual(decoder.calls, []);
    assert.equal(result.extraction.missingDocuments.length, 6);
    assert.equal(result.extraction.verificationStatus, "incomplete");
    assert.equal(result.validation.validationStatus, "failed");
    assert.equal(result.summary.quality_score, 0.36);
    assert.equal(result.decision.finalDecision, "DENY");
    assert.deepEqual(result.decision.criticalFlags, ["INSUFFICIENT_DATA_QUALITY"]);
  });

  it("records a document that fails to decode and keeps going", async () => {
    const withoutCredit = Object.fromEntries(
      Object.entries(DECODED_BY_FILENAME).filter(([name]) => name !== "credit_report.json")
    );
    const result = await assessApplication(
      path.join(root, "APP-001"),
      "APP-001",
      options(new FakeDecoder(withoutCredit))
    );

    const credit = result.extraction.documents.credit_report;
    assert.equal(credit.status, "failed");
    assert.deepEqual(credit.errors, ["No fixture for credit_report.json"]);
    assert.equal(result.extraction.verificationStatus, "incomplete");
    assert.deepEqual(result.validation.findings.map((f) => f.message), ["Credit report data missing"]);
    assert.equal(result.validation.categoryScores.credit, 0.5);
    assert.equal(result.validation.completenessScore, 0.85);
    assert.equal(result.validation.documentsReviewed, 6);
    assert.equal(result.validation.validationStatus, "passed_with_warnings");
  });

  it("produces identical output for identical input", async () => {
    const first = await assessApplication(path.join(root, "APP-001"), "APP-001", options());
    const second = await assessApplication(path.join(root, "APP-001"), "APP-001", options());
    assert.equal(JSON.stringify(second), JSON.stringify(first));
  });

  it("serializes the same report when processing times differ", async () => {
    const ticking = (step: number) => {
      let clock = 0;
      return () => (clock += step);
    };
    const dir = path.join(root, "APP-001");
    const fast = await assessApplication(dir, "APP-001", { ...options(), now: ticking(1) });
    const slow = await assessApplication(dir, "APP-001", { ...options(), now: ticking(50) });

    assert.notEqual(
      slow.extraction.documents.identity_card.processingDurationMs,
      fast.extraction.documents.identity_card.processingDurationMs
    );
    const report = (a: typeof fast) =>
      JSON.stringify({ summary: a.summary, extraction: serializeExtraction(a.extraction), decision: serializeDecision(a.decision) });
    assert.equal(report(slow), report(fast));
  });
});

describe("assessBatch", () => {
  it("assesses every application folder in sorted order", async () => {
    const batch = await assessBatch(root, {
      ...options(),
      config: { ...DEFAULT_PIPELINE_CONFIG, maxConcurrentApplications: 2 },
    });

    assert.deepEqual(
      batch.assessments.map((a) => [a.applicationId, a.decision.finalDecision]),
      [
        ["APP-001", "APPROVE"],
        ["APP-EMPTY", "DENY"],
      ]
    );
    assert.equal(batch.summary.totalApplications, 2);
    assert.deepEqual(batch.summary.decisions.APPROVE, { count: 1, percentage: 50 });
    assert.equal(batch.summary.appealsEligible, 1);
  });

  it("limits the run to the requested ids", async () => {
    const batch = await assessBatch(root, { ...options(), applicationIds: ["APP-EMPTY"] });
    assert.deepEqual(batch.assessments.map((a) => a.applicationId), ["APP-EMPTY"]);
  });
});
