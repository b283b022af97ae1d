import { Command } from '@commander-js/extra-typings';
import { runMcpServer } from '../../mcp/index.js';
import { exitWithError } from '../run.js';

export const mcpCommand = new Command('mcp')
  .description('Run the MCP server over stdio')
  .action(async () => {
    try {
      await runMcpServer();
    } catch (error) {
      exitWithError(error);
    }
  });
