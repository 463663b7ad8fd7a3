import "dotenv/config";
import * as fs from 'node:fs';
import * as path from 'node:path';

import { DecisionEngine, summarizeDecisions } from '../assessment/decisionEngine.js';
import {
  parseDecisionInput,
  serializeDecision,
  serializeDecisionSummary,
} from '../assessment/validationSummary.js';
import { loadPipelineConfig } from '../core/config.js';
import { logger } from '../utils/logger.js';
import { readFlag, resolveUserPath } from './cliArgs.js';
import { runCli } from './cliRunner.js';

function main(): number {
  // --- Argument Parsing ---
  const args = process.argv.slice(2);
  logger.level = loadPipelineConfig().logLevel;
  const inputArg = readFlag(args, 'input');
  const idArg = readFlag(args, 'id');
  const outArg = readFlag(args, 'out');

  if (!inputArg) {
    console.error("Usage: npm run decide -- --input=<validation_results.json> [--id=<application_id>] [--out=<file>]");
    return 1;
  }

  const inputPath = resolveUserPath(inputArg);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: File not found: ${inputPath}`);
    return 1;
  }

  const summaries = parseDecisionInput(JSON.parse(fs.readFileSync(inputPath, 'utf8')));
  const engine = new DecisionEngine(summaries);
  const decisions = engine.decideBatch(idArg ? [idArg] : undefined);

  const json = JSON.stringify({
    decisions: decisions.map(serializeDecision),
    summary: serializeDecisionSummary(summarizeDecisions(decisions)),
  }, null, 2);

  if (outArg) {
    const outPath = resolveUserPath(outArg);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, `${json}\n`);
    console.log(`Decided ${decisions.length} application(s); results written to ${outPath}`);
  } else {
    console.log(json);
  }
  return 0;
}

void runCli('decide', main).then((code) => {
  process.exitCode = code;
});
