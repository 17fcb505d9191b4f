import { parseArgs as parseNodeArgs } from 'node:util';

import type { ScanConfig } from '../config/types.js';
import { DEFAULT_WORKER_COUNT } from '../lib/constants.js';
import { toErrorMessage } from '../lib/errors.js';
import { CliArgsSchema } from '../schemas/index.js';

export const BANNER = String.raw`
  ____        _        __  __            _____ _           _
 |  _ \ _   _| | ___  |  \/  |___  __ _ |  ___(_)_ __   __| | ___ _ __
 | |_) | | | | |/ _ \ | |\/| / __|/ _' || |_  | | '_ \ / _' |/ _ \ '__|
 |  _ <| |_| | |  __/ | |  | \__ \ (_| ||  _| | | | | | (_| |  __/ |
 |_| \_\\__,_|_|\___| |_|  |_|___/\__, ||_|   |_|_| |_|\__,_|\___|_|
                                  |___/
`;

export const USAGE = `Usage: rule-msg-finder -i <input_file> -s <service_name> [options]

Search for service names in the msg field of rule files.

Options:
  -i, --input_file <path>     Path to the input rule file
  -o, --output_file <path>    Append matched rules to this file (optional)
  -s, --service_name <name>   Service name to search for in the 'msg' field
  -t, --threads <n>           Number of workers to use (default: ${DEFAULT_WORKER_COUNT})
      --mcp                   Serve the search_rules tool over MCP stdio
  -h, --help                  Show this help
${BANNER}`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'mcp' }
  | { kind: 'scan'; config: ScanConfig };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function formatIssues(error: {
  issues: { path: (string | number)[]; message: string }[];
}): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function readArgv(argv: readonly string[]) {
  try {
    return parseNodeArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        input_file: { type: 'string', short: 'i' },
        output_file: { type: 'string', short: 'o' },
        service_name: { type: 'string', short: 's' },
        threads: { type: 'string', short: 't' },
        mcp: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      } as const,
    });
  } catch (error: unknown) {
    throw new CliUsageError(toErrorMessage(error));
  }
}

/**
 * Parse command line arguments into a command.
 *
 * @throws CliUsageError for unknown flags, missing required flags or an
 * invalid thread count
 */
export function parseArgs(
  argv: readonly string[] = process.argv.slice(2)
): CliCommand {
  const { values } = readArgv(argv);

  if (values.help) return { kind: 'help' };
  if (values.mcp) return { kind: 'mcp' };

  if (values.input_file === undefined) {
    throw new CliUsageError('the following argument is required: -i/--input_file');
  }
  if (values.service_name === undefined) {
    throw new CliUsageError(
      'the following argument is required: -s/--service_name'
    );
  }

  const parsed = CliArgsSchema.safeParse({
    inputFile: values.input_file,
    outputFile: values.output_file,
    serviceName: values.service_name,
    threads: values.threads,
  });
  if (!parsed.success) {
    throw new CliUsageError(formatIssues(parsed.error));
  }

  const { inputFile, outputFile, serviceName, threads } = parsed.data;
  return {
    kind: 'scan',
    config: {
      inputPath: inputFile,
      serviceName,
      workerCount: threads,
      output:
        outputFile === undefined
          ? { kind: 'console' }
          : { kind: 'file', path: outputFile },
    },
  };
}
