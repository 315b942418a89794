/**
 * serve command - Start the MCP server
 */

import { Command } from 'commander';
import { startStdioServer } from '../../server/index.js';
import { addCommonOptions, errorMessage, openAgent, type CommonOptions } from '../shared.js';

export const serveCommand = addCommonOptions(new Command('serve'))
  .description('Start the MCP server over stdio')
  .action(async (options: CommonOptions) => {
    try {
      const agent = await openAgent(options);

      await startStdioServer(agent, {
        name: 'event-scout',
        version: '1.0.0',
      });

    } catch (error) {
      // Log to stderr since stdout is used for MCP communication
      console.error('Error starting server:', errorMessage(error));
      process.exit(1);
    }
  });
