/**
 * Tools command - Lists the tools the server exposes
 */

import { Command } from 'commander';
import { ToolSystem } from '../../tools/tool-system.js';
import { createQarnotTools } from '../../tools/qarnot-tools.js';
import { ConnectionProvider } from '../../qarnot/connection.js';
import { QarnotError } from '../../qarnot/errors.js';
import { formatToolList } from '../utils/format.js';

export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd
    .description('List available tools and their parameters')
    .action(() => {
      // Listing never reaches the service, so no configuration is needed.
      const toolSystem = new ToolSystem();
      createQarnotTools(toolSystem, new ConnectionProvider(() => {
        throw new QarnotError('configuration', 'Listing tools does not open a connection');
      }));
      console.log(formatToolList(toolSystem.list()));
    });

  return cmd;
}
