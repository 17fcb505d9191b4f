import { readFileSync } from 'node:fs';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { LOG_LEVEL } from './lib/constants.js';
import { createMcpLogger, type Logger } from './lib/logger.js';
import { registerAllTools } from './tools/index.js';

const SERVER_INSTRUCTIONS = `
Rule message finder

Use search_rules to list the rules in a rule file (one rule per line, such as
Suricata or Snort rules) whose msg:"..." field mentions a service name. The
match is a case-insensitive substring match against the msg field only.
`;

function readServerVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof raw === 'object' &&
    raw !== null &&
    'version' in raw &&
    typeof raw.version === 'string'
  ) {
    return raw.version;
  }
  return '0.0.0';
}

export function createServer(fallbackLogger: Logger): McpServer {
  const server = new McpServer(
    {
      name: 'rule-msg-finder',
      version: readServerVersion(),
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        logging: {},
      },
    }
  );

  registerAllTools(server, createMcpLogger(server, fallbackLogger, LOG_LEVEL));

  return server;
}

export async function startServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
