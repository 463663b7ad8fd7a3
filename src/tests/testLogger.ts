/**
 * Logger option tests.
 *
 * Run: node --import tsx --test src/tests/testLogger.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { REDACTED_PATHS, buildLoggerOptions } from "../utils/logger.js";

describe("buildLoggerOptions", () => {
  it("writes JSON at info level by default and censors applicant identifiers", () => {
    const options = buildLoggerOptions({});

    assert.equal(options.level, "info");
    assert.equal(options.transport, undefined);
    assert.deepEqual(options.base, { service: "social-support-assessment" });
    assert.deepEqual(options.redact, { paths: REDACTED_PATHS, censor: "[redacted]" });
  });

  it("honours LOG_LEVEL and pretty-prints in development", () => {
    const options = buildLoggerOptions({ LOG_LEVEL: "debug", NODE_ENV: "development" });

    assert.equal(options.level, "debug");
    assert.deepEqual(options.transport, {
      target: "pino-pretty",
      options: { colorize: true, ignore: "pid,hostname,service" },
    });
  });
});
