import "dotenv/config";
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

import { loadGroundTruth } from '../assessment/groundTruth.js';
import { assessBatch } from '../assessment/pipeline.js';
import {
  serializeDecision,
  serializeDecisionSummary,
  serializeExtraction,
} from '../assessment/validationSummary.js';
import { loadPipelineConfig } from '../core/config.js';
import { logger } from '../utils/logger.js';
import { parseReferenceDate, readFlag, resolveUserPath } from './cliArgs.js';
import { runCli } from './cliRunner.js';

const USAGE = [
  "Usage: npm run assess -- --path=<applications_root> [--id=<application_id>] [--ground-truth=<file>]",
  "                         [--reference-date=YYYY-MM-DD] [--out=<file>]",
  "  --path may be omitted when APPLICATIONS_ROOT is set",
].join('\n');

async function main(): Promise<number> {
  // --- Argument Parsing ---
  const args = process.argv.slice(2);
  const config = loadPipelineConfig();
  logger.level = config.logLevel;
  const rootArg = readFlag(args, 'path') ?? config.applicationsRoot ?? undefined;
  const idArg = readFlag(args, 'id');
  const groundTruthArg = readFlag(args, 'ground-truth') ?? config.groundTruthPath ?? undefined;
  const referenceDateArg = readFlag(args, 'reference-date');
  const outArg = readFlag(args, 'out');

  if (!rootArg) {
    console.error(USAGE);
    return 1;
  }

  const root = resolveUserPath(rootArg);
  if (!fs.existsSync(root)) {
    console.error(`Error: Folder not found: ${root}`);
    return 1;
  }

  const referenceDate = referenceDateArg ? parseReferenceDate(referenceDateArg) : undefined;
  const runId = randomUUID();
  const groundTruth = groundTruthArg ? await loadGroundTruth(resolveUserPath(groundTruthArg)) : undefined;
  logger.info(
    { event: 'assessment_started', runId, root, referenceDate: referenceDateArg ?? 'today', groundTruthRecords: groundTruth?.size ?? 0 },
    'Assessment run started'
  );

  const batch = await assessBatch(root, {
    config,
    groundTruth,
    referenceDate,
    runId,
    applicationIds: idArg ? [idArg] : undefined,
  });

  const report = {
    applications: batch.assessments.map((a) => a.summary),
    extractions: batch.assessments.map((a) => serializeExtraction(a.extraction)),
    decisions: batch.assessments.map((a) => serializeDecision(a.decision)),
    summary: serializeDecisionSummary(batch.summary),
  };
  const json = JSON.stringify(report, null, 2);

  if (outArg) {
    const outPath = resolveUserPath(outArg);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, `${json}\n`);
    console.log(`Assessed ${batch.assessments.length} application(s); report written to ${outPath}`);
  } else {
    console.log(json);
  }
  return 0;
}

void runCli('assess', main).then((code) => {
  process.exitCode = code;
});
