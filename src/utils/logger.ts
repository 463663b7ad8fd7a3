/**
 * Structured pipeline logger.
 *
 * Records carry applicationId, documentKind and runId where known. National
 * ids and account numbers are censored before a record is written.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export const REDACTED_PATHS = [
  'nationalId',
  '*.nationalId',
  'accountNumber',
  '*.accountNumber',
];

export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const pretty = env.NODE_ENV === 'development';
  return {
    level: env.LOG_LEVEL || 'info',
    base: { service: 'social-support-assessment' },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    // pretty output only for local runs; stdout stays JSON lines otherwise
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname,service' } }
      : undefined,
  };
}

export const logger: Logger = pino(buildLoggerOptions());

export interface LogContext {
  applicationId?: string;
  documentKind?: string;
  runId?: string;
}

export function createContextLogger(context: LogContext): Logger {
  return logger.child(context);
}
