/**
 * Naming-convention document discovery tests.
 *
 * Run: node --import tsx --test src/tests/testDocumentLocator.ts
 */

import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { listApplicationIds, locateDocuments, matchDocumentKind } from "../triage/documentLocator.js";

let root: string;

before(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "locator-"));
  const app = path.join(root, "APP-002");
  await fs.mkdir(app);
  await fs.mkdir(path.join(root, "APP-001"));
  await fs.mkdir(path.join(root, ".cache"));
  for (const name of [
    "APP-002_Bank_Statement_March.pdf",
    "APP-002_bank_statement_april.pdf",
    "emirates_id.PNG",
    "resume.docx",
    "credit_report.json",
    "notes.txt",
  ]) {
    await fs.writeFile(path.join(app, name), "");
  }
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("matchDocumentKind", () => {
  it("matches keyword and extension case-insensitively", () => {
    assert.equal(matchDocumentKind("Emirates_ID_front.png"), "identity_card");
    assert.equal(matchDocumentKind("assets_liabilities_2025.XLSX"), "assets_liabilities");
  });

  it("requires the expected extension", () => {
    assert.equal(matchDocumentKind("resume.docx"), null);
    assert.equal(matchDocumentKind("credit_report.pdf"), null);
  });
});

describe("locateDocuments", () => {
  it("picks the lexicographically first match and lists the rest as missing", async () => {
    const located = await locateDocuments(path.join(root, "APP-002"));
    assert.deepEqual(located.found, {
      bank_statement: path.join(root, "APP-002", "APP-002_Bank_Statement_March.pdf"),
      identity_card: path.join(root, "APP-002", "emirates_id.PNG"),
      credit_report: path.join(root, "APP-002", "credit_report.json"),
    });
    assert.deepEqual(located.missing, ["employment_letter", "resume", "assets_liabilities"]);
  });

  it("reports every kind missing for an absent directory", async () => {
    const located = await locateDocuments(path.join(root, "APP-404"));
    assert.deepEqual(located.found, {});
    assert.equal(located.missing.length, 6);
  });
});

describe("listApplicationIds", () => {
  it("lists visible sub-directories in sorted order", async () => {
    assert.deepEqual(await listApplicationIds(root), ["APP-001", "APP-002"]);
  });
});
