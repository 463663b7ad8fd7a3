/**
 * Pipeline Configuration
 *
 * Runtime knobs read from the environment (`.env` is loaded by the entry
 * points through dotenv). Decision thresholds are not configurable here; they
 * live beside the code that applies them.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DOCUMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_CONCURRENT_APPLICATIONS: z.coerce.number().int().positive().max(64).default(4),
  APPLICATIONS_ROOT: z.string().optional(),
  GROUND_TRUTH_PATH: z.string().optional(),
});

export interface PipelineConfig {
  logLevel: typeof LOG_LEVELS[number];
  /** Upper bound for decoding plus field extraction of one document. */
  documentTimeoutMs: number;
  maxConcurrentApplications: number;
  applicationsRoot: string | null;
  groundTruthPath: string | null;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  logLevel: 'info',
  documentTimeoutMs: 30_000,
  maxConcurrentApplications: 4,
  applicationsRoot: null,
  groundTruthPath: null,
};

/**
 * Parses pipeline settings from an environment map. Empty values count as unset.
 * Throws when a value is present but invalid.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${issues}`);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    documentTimeoutMs: parsed.data.DOCUMENT_TIMEOUT_MS,
    maxConcurrentApplications: parsed.data.MAX_CONCURRENT_APPLICATIONS,
    applicationsRoot: parsed.data.APPLICATIONS_ROOT ?? null,
    groundTruthPath: parsed.data.GROUND_TRUTH_PATH ?? null,
  };
}
