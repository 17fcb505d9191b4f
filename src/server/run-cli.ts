import { ScanError, toErrorMessage } from '../lib/errors.js';
import { isAbortError } from '../lib/fs-helpers/abort.js';
import type { Logger } from '../lib/logger.js';
import type { ChunkExecutor } from '../lib/rule-search/executors.js';
import { runScan } from '../lib/rule-search/orchestrator.js';
import { CliUsageError, parseArgs, USAGE } from './cli.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunCliDeps {
  logger: Logger;
  stdout: (text: string) => void;
  serve: () => Promise<void>;
  signal?: AbortSignal;
  executor?: ChunkExecutor;
}

function withExitNotice(message: string): string {
  const sentence = /[.?!]$/u.test(message) ? message : `${message}.`;
  return `${sentence} Exiting the program.`;
}

function reportFatal(error: unknown, logger: Logger): number {
  if (isAbortError(error)) {
    logger.error('Operation cancelled by user');
    return EXIT_FAILURE;
  }
  if (error instanceof ScanError) {
    logger.error(withExitNotice(error.message));
    return EXIT_FAILURE;
  }
  logger.error(`Unexpected error: ${toErrorMessage(error)}`);
  return EXIT_FAILURE;
}

/**
 * Run the command line tool and resolve with the process exit code.
 * Zero matches is a successful run.
 */
export async function runCli(
  argv: readonly string[],
  deps: RunCliDeps
): Promise<number> {
  const { logger } = deps;

  let command: ReturnType<typeof parseArgs>;
  try {
    command = parseArgs(argv);
  } catch (error: unknown) {
    if (!(error instanceof CliUsageError)) throw error;
    logger.error(`Invalid arguments: ${error.message}`);
    return EXIT_USAGE;
  }

  switch (command.kind) {
    case 'help':
      deps.stdout(USAGE);
      return EXIT_OK;
    case 'mcp':
      await deps.serve();
      return EXIT_OK;
    case 'scan':
      try {
        await runScan(command.config, {
          logger,
          signal: deps.signal,
          executor: deps.executor,
        });
        return EXIT_OK;
      } catch (error: unknown) {
        return reportFatal(error, logger);
      }
  }
}
