import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { Logger } from '../lib/logger.js';
import { registerSearchRulesTool } from './search-rules.js';

export function registerAllTools(server: McpServer, logger: Logger): void {
  registerSearchRulesTool(server, logger);
}
