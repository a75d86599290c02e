/**
 * Call command - Runs one tool from the command line
 */

import { Command } from 'commander';
import { randomUUID } from 'node:crypto';
import { loadRuntime } from '../utils/runtime.js';
import { parseToolArguments } from '../utils/format.js';
import { describeToolFailure } from '../../server/mcp-server.js';

export function callCommand(): Command {
  const cmd = new Command('call');

  cmd
    .description('Run a tool once and print its output (e.g. call get_task_status \'{"uuid": "..."}\')')
    .argument('<tool>', 'Tool name')
    .argument('[arguments]', 'Tool arguments as a JSON object')
    .action(async (tool: string, args: string | undefined) => {
      await runCall(tool, args);
    });

  return cmd;
}

async function runCall(tool: string, rawArgs: string | undefined): Promise<void> {
  let args: Record<string, unknown>;
  try {
    args = parseToolArguments(rawArgs);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { toolSystem } = await loadRuntime();
  const result = await toolSystem.execute({ id: randomUUID(), name: tool, arguments: args });

  if (result.success) {
    console.log(result.output ?? '');
  } else {
    console.error(describeToolFailure(result));
    process.exitCode = 1;
  }
}
