/**
 * CLI helper tests: flags, reference dates and failure handling.
 *
 * Run: node --import tsx --test src/tests/testCliArgs.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import * as path from "node:path";

import { loadPipelineConfig } from "../core/config.js";
import { parseReferenceDate, readFlag, resolveUserPath } from "../scripts/cliArgs.js";
import { runCli } from "../scripts/cliRunner.js";

describe("readFlag", () => {
  const args = ["--path=./apps", "--id=", "--out= report.json "];

  it("returns the trimmed value of a --name=value flag", () => {
    assert.equal(readFlag(args, "path"), "./apps");
    assert.equal(readFlag(args, "out"), "report.json");
  });

  it("treats empty and absent flags alike", () => {
    assert.equal(readFlag(args, "id"), undefined);
    assert.equal(readFlag(args, "reference-date"), undefined);
  });
});

describe("resolveUserPath", () => {
  it("makes relative paths absolute", () => {
    assert.equal(resolveUserPath("apps/APP-001"), path.resolve("apps/APP-001"));
  });
});

describe("parseReferenceDate", () => {
  it("parses an ISO day as local midnight", () => {
    assert.deepEqual(parseReferenceDate("2025-03-03"), new Date(2025, 2, 3));
  });

  it("rejects other formats and impossible days", () => {
    assert.throws(() => parseReferenceDate("03/03/2025"), /^Error: Invalid reference date "03\/03\/2025": expected YYYY-MM-DD$/);
    assert.throws(() => parseReferenceDate("2025-02-30"), /^Error: Invalid reference date "2025-02-30"/);
  });
});

describe("runCli", () => {
  it("passes the exit code of a successful run through", async () => {
    const lines: string[] = [];
    assert.equal(await runCli("decide", () => 0, (line) => lines.push(line)), 0);
    assert.deepEqual(lines, []);
  });

  it("reports a configuration error and exits with 1", async () => {
    const lines: string[] = [];
    const code = await runCli(
      "assess",
      () => {
        loadPipelineConfig({ MAX_CONCURRENT_APPLICATIONS: "0" });
        return 0;
      },
      (line) => lines.push(line)
    );
    assert.equal(code, 1);
    assert.equal(lines.length, 1);
    assert.match(lines[0] ?? "", /^Error: Invalid pipeline configuration: MAX_CONCURRENT_APPLICATIONS/);
  });

  it("reports a rejected async run", async () => {
    const lines: string[] = [];
    const code = await runCli("assess", async () => {
      throw new Error("Folder unreadable");
    }, (line) => lines.push(line));
    assert.equal(code, 1);
    assert.deepEqual(lines, ["Error: Folder unreadable"]);
  });
});
