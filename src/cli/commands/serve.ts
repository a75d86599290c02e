/**
 * Serve command - Runs the MCP server on stdio
 *
 * stdout carries the protocol: nothing else may be printed to it here.
 */

import { Command } from 'commander';
import { createMcpServer, serveStdio } from '../../server/mcp-server.js';
import { loadRuntime, readPackageVersion } from '../utils/runtime.js';

export function serveCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the MCP server on stdio')
    .action(async () => {
      await runServe();
    });

  return cmd;
}

async function runServe(): Promise<void> {
  const { logger, toolSystem } = await loadRuntime();

  const server = createMcpServer(toolSystem, { name: 'qarnot', version: readPackageVersion() });

  const shutdown = async (): Promise<void> => {
    await logger.info('Shutting down MCP server');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await serveStdio(server, logger);
  } catch (error) {
    await logger.error('Failed to start MCP server', error);
    console.error('Failed to start MCP server:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
