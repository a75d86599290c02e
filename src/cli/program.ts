import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { toolsCommand } from './commands/tools.js';
import { callCommand } from './commands/call.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';
import { readPackageVersion } from './utils/runtime.js';

/**
 * Creates the qarnot-mcp command line program. `serve` runs when no
 * command is given, which is how MCP hosts launch the server.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('qarnot-mcp')
    .description('MCP server exposing Qarnot tasks and storage as agent tools')
    .version(readPackageVersion(), '-v, --version', 'Display version number');

  program.addCommand(serveCommand(), { isDefault: true });
  program.addCommand(toolsCommand());
  program.addCommand(callCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}
