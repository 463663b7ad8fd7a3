import { logger } from '../utils/logger.js';

export type CliMain = () => number | Promise<number>;

/**
 * Runs a CLI entry point and turns any failure, including configuration
 * errors, into a logged fatal event and exit code 1.
 */
export async function runCli(
  command: string,
  main: CliMain,
  report: (line: string) => void = (line) => console.error(line)
): Promise<number> {
  try {
    return await main();
  } catch (error) {
    logger.fatal({ event: 'cli_failed', command, err: error }, `${command} failed`);
    report(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
