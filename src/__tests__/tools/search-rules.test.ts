import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { describe, expect, it } from 'vitest';

import { ErrorCode, getSuggestion } from '../../lib/errors.js';
import {
  handleSearchRules,
  registerSearchRulesTool,
} from '../../tools/search-rules.js';
import { createCapturedLogger } from '../lib/fixtures/memory-logger.js';
import {
  buildRuleSet,
  SCENARIO_RULES,
  SSH_LOGIN_RULE,
  SSH_POLICY_RULE,
  writeRuleFile,
} from '../lib/fixtures/rule-fixture.js';
import { useTempDir } from '../lib/fixtures/temp-dir-hooks.js';

const getTestDir = useTempDir();

describe('search_rules', () => {
  it('registers once on an MCP server', () => {
    const server = new McpServer({ name: 'rule-msg-finder', version: '0.0.0' });
    const { logger } = createCapturedLogger();

    registerSearchRulesTool(server, logger);

    expect(() => {
      registerSearchRulesTool(server, logger);
    }).toThrow('Tool search_rules is already registered');
  });

  it('returns matched rules when no output path is given', async () => {
    const inputPath = await writeRuleFile(
      getTestDir(),
      'scenario.rules',
      SCENARIO_RULES
    );
    const { logger, messages } = createCapturedLogger();

    const result = await handleSearchRules(
      { inputPath, serviceName: 'service', workers: 2 },
      logger
    );

    if ('isError' in result) throw new Error(result.content[0]?.text);
    const structured = result.structuredContent;
    expect(structured).toMatchObject({
      ok: true,
      serviceName: 'service',
      inputPath,
      totalMatches: 2,
      linesScanned: 3,
      chunksFailed: 0,
    });
    expect([...(structured.matches ?? [])].sort()).toEqual(
      [SSH_POLICY_RULE.trimEnd(), SSH_LOGIN_RULE.trimEnd()].sort()
    );

    const text = result.content[0]?.text ?? '';
    expect(text.split('\n')[0]).toBe(
      `Found 2 matching rules for 'service' in ${inputPath} (3 lines scanned)`
    );
    expect(text.split('\n')[1]).toBe('');
    // Matches go back to the caller, not to the log
    expect(messages('INFO')).toEqual([
      `Starting search for service 'service' in file '${inputPath}' with 2 workers...`,
      'Total matches 2 for the service name service',
    ]);
  });

  it('appends matched rules to the output path', async () => {
    const inputPath = await writeRuleFile(
      getTestDir(),
      'rules.rules',
      buildRuleSet(30)
    );
    const outputPath = path.join(getTestDir(), 'matches.rules');
    const { logger } = createCapturedLogger();

    const result = await handleSearchRules(
      { inputPath, serviceName: 'acme portal', outputPath, workers: 4 },
      logger
    );

    expect(result.content[0]?.text).toBe(
      [
        `Found 10 matching rules for 'acme portal' in ${inputPath} (30 lines scanned)`,
        `Matched rules appended to ${outputPath}`,
      ].join('\n')
    );
    expect(result.structuredContent).toMatchObject({
      ok: true,
      totalMatches: 10,
      outputPath,
    });
    const written = await fs.readFile(outputPath, 'utf-8');
    expect(written.split('\n').filter(Boolean)).toHaveLength(10);
  });

  it('reports a missing file as a tool error', async () => {
    const inputPath = path.join(getTestDir(), 'absent.rules');
    const { logger } = createCapturedLogger();

    const result = await handleSearchRules(
      { inputPath, serviceName: 'ssh', workers: 1 },
      logger
    );

    expect(result).toEqual({
      isError: true,
      content: [
        {
          type: 'text',
          text: [
            `Error [E_NOT_FOUND]: File not found: ${inputPath}. Perhaps misspelled?`,
            `Path: ${inputPath}`,
            `Suggestion: ${getSuggestion(ErrorCode.E_NOT_FOUND)}`,
          ].join('\n'),
        },
      ],
      structuredContent: {
        ok: false,
        error: {
          code: ErrorCode.E_NOT_FOUND,
          message: `File not found: ${inputPath}. Perhaps misspelled?`,
          path: inputPath,
          suggestion: getSuggestion(ErrorCode.E_NOT_FOUND),
        },
      },
    });
  });

  it('reports an empty service name as an invalid configuration', async () => {
    const inputPath = await writeRuleFile(
      getTestDir(),
      'scenario.rules',
      SCENARIO_RULES
    );
    const { logger } = createCapturedLogger();

    const result = await handleSearchRules(
      { inputPath, serviceName: '', workers: 2 },
      logger
    );

    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: {
        code: ErrorCode.E_INVALID_CONFIG,
        message: 'No service name provided',
      },
    });
  });
});
