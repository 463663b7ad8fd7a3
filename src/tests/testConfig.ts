/**
 * Pipeline configuration tests.
 *
 * Run: node --import tsx --test src/tests/testConfig.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig } from "../core/config.js";

describe("loadPipelineConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    assert.deepEqual(loadPipelineConfig({}), DEFAULT_PIPELINE_CONFIG);
  });

  it("coerces numeric settings and keeps paths", () => {
    const config = loadPipelineConfig({
      LOG_LEVEL: "debug",
      DOCUMENT_TIMEOUT_MS: "5000",
      MAX_CONCURRENT_APPLICATIONS: "8",
      APPLICATIONS_ROOT: "/data/applications",
      GROUND_TRUTH_PATH: "/data/ground_truth.csv",
    });
    assert.deepEqual(config, {
      logLevel: "debug",
      documentTimeoutMs: 5000,
      maxConcurrentApplications: 8,
      applicationsRoot: "/data/applications",
      groundTruthPath: "/data/ground_truth.csv",
    });
  });

  it("treats blank values as unset", () => {
    const config = loadPipelineConfig({ DOCUMENT_TIMEOUT_MS: "  ", APPLICATIONS_ROOT: "" });
    assert.equal(config.documentTimeoutMs, 30_000);
    assert.equal(config.applicationsRoot, null);
  });

  it("rejects invalid values with the offending key", () => {
    assert.throws(
      () => loadPipelineConfig({ MAX_CONCURRENT_APPLICATIONS: "0" }),
      /Invalid pipeline configuration: MAX_CONCURRENT_APPLICATIONS/
    );
    assert.throws(
      () => loadPipelineConfig({ LOG_LEVEL: "verbose" }),
      /Invalid pipeline configuration: LOG_LEVEL/
    );
  });
});
