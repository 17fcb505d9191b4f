import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { z } from 'zod';

import type { ScanConfig, ScanSummary } from '../config/types.js';
import { ErrorCode } from '../lib/errors.js';
import { stripLineTerminator } from '../lib/fs-helpers/read-lines.js';
import type { Logger } from '../lib/logger.js';
import { runScan } from '../lib/rule-search/orchestrator.js';
import { createCollectingSink } from '../lib/rule-search/sinks.js';
import {
  SearchRulesInputSchema,
  SearchRulesOutputSchema,
} from '../schemas/index.js';
import { runTool, type ToolResult, toolSuccess } from './tool-response.js';

type SearchRulesArgs = z.infer<z.ZodObject<typeof SearchRulesInputSchema>>;
type SearchRulesStructuredResult = z.infer<typeof SearchRulesOutputSchema>;

function buildScanConfig(args: SearchRulesArgs): ScanConfig {
  return {
    inputPath: args.inputPath,
    serviceName: args.serviceName,
    workerCount: args.workers,
    output:
      args.outputPath === undefined
        ? { kind: 'console' }
        : { kind: 'file', path: args.outputPath },
  };
}

function buildTextResult(
  summary: ScanSummary,
  matches: readonly string[] | undefined,
  outputPath: string | undefined
): string {
  const lines = [
    `Found ${String(summary.totalMatches)} matching rules for '${summary.serviceName}' in ${summary.inputPath} (${String(summary.linesScanned)} lines scanned)`,
  ];
  if (summary.failures.length > 0) {
    lines.push(
      `${String(summary.failures.length)} chunk(s) failed; the total may be incomplete`
    );
  }
  if (outputPath !== undefined) {
    lines.push(`Matched rules appended to ${outputPath}`);
  } else if (matches && matches.length > 0) {
    lines.push('', ...matches);
  }
  return lines.join('\n');
}

export async function handleSearchRules(
  args: SearchRulesArgs,
  logger: Logger
): Promise<ToolResult<SearchRulesStructuredResult>> {
  return await runTool(
    async () => {
      const config = buildScanConfig(args);
      const collector =
        config.output.kind === 'console' ? createCollectingSink() : undefined;
      const summary = await runScan(config, { logger, sink: collector });
      const matches = collector?.lines.map(stripLineTerminator);

      const structured: SearchRulesStructuredResult = {
        ok: true,
        serviceName: summary.serviceName,
        inputPath: summary.inputPath,
        totalMatches: summary.totalMatches,
        linesScanned: summary.linesScanned,
        chunksFailed: summary.failures.length,
        outputPath: args.outputPath,
        matches,
      };
      return toolSuccess(
        buildTextResult(summary, matches, args.outputPath),
        structured
      );
    },
    ErrorCode.E_UNKNOWN,
    args.inputPath
  );
}

const SEARCH_RULES_TOOL = {
  title: 'Search Rules',
  description:
    "Find rules whose msg field contains a service name (case-insensitive substring). " +
    'Scans the whole rule file in parallel chunks. ' +
    'Without outputPath the matched rule lines are returned; with outputPath they are appended to that file.',
  inputSchema: SearchRulesInputSchema,
  outputSchema: SearchRulesOutputSchema.shape,
  annotations: {
    readOnlyHint: false,
    idempotentHint: false,
    openWorldHint: false,
  },
} as const;

export function registerSearchRulesTool(server: McpServer, logger: Logger): void {
  server.registerTool(
    'search_rules',
    SEARCH_RULES_TOOL,
    async (args: SearchRulesArgs) => await handleSearchRules(args, logger)
  );
}
