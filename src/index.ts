#!/usr/bin/env node
/**
 * Rule message finder
 *
 * Scans a rule file (one rule per line) for rules whose msg:"..." field
 * mentions a service name, in parallel chunks, and logs the matches or
 * appends them to a file.
 *
 * Usage:
 *   rule-msg-finder -i rules.rules -s ssh
 *   rule-msg-finder -i rules.rules -s ssh -o matches.rules -t 8
 *   rule-msg-finder --mcp   # serve the search_rules tool over stdio
 */
import { LOG_LEVEL } from './lib/constants.js';
import { createConsoleLogger } from './lib/logger.js';
import { runCli } from './server/run-cli.js';
import { createServer, startServer } from './server.js';

const logger = createConsoleLogger({ level: LOG_LEVEL });
const controller = new AbortController();

async function main(): Promise<number> {
  return await runCli(process.argv.slice(2), {
    logger,
    signal: controller.signal,
    stdout: (text) => {
      process.stdout.write(text);
    },
    serve: async () => {
      const shutdown = (): void => {
        process.exit(0);
      };
      process.once('SIGTERM', shutdown);
      process.once('SIGINT', shutdown);
      await startServer(createServer(logger));
    },
  });
}

// First SIGINT stops dispatching new chunks; a second one exits at once
process.on('SIGINT', () => {
  if (controller.signal.aborted) process.exit(1);
  controller.abort();
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exitCode = 1;
  });
