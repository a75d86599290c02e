/**
 * Logs command - Print recent log entries
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { formatLogEntry, isAtLeast, isLogLevel, parseLogLine } from '../utils/format.js';
import { resolveLogPath } from '../utils/runtime.js';
import type { LogEntry } from '../../logging/logger.js';

interface LogsOptions {
  level?: string;
  lines?: number;
  color?: boolean;
}

export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('Show recent log entries, including rotated files')
    .option('-l, --level <level>', 'Filter by minimum log level (debug, info, warn, error)')
    .option('-n, --lines <count>', 'Number of entries to show', (value: string) => parseInt(value, 10))
    .option('--no-color', 'Print without terminal colors')
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

async function runLogs(options: LogsOptions): Promise<void> {
  const minLevel = options.level;
  if (minLevel !== undefined && !isLogLevel(minLevel)) {
    console.error(`Invalid log level: ${minLevel}`);
    console.error('Valid levels: debug, info, warn, error');
    process.exit(1);
  }

  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);
  await configManager.load();

  const logger = new Logger({
    path: resolveLogPath(workspace, configManager.config),
    maxFiles: configManager.config.logging.maxFiles,
  });
  const files = await logger.listLogFiles();
  if (files.length === 0) {
    console.log('No log file found.');
    return;
  }

  // Oldest file first so entries print in time order.
  const entries: LogEntry[] = [];
  for (const file of [...files].reverse()) {
    const content = await readFile(file, 'utf-8');
    for (const line of content.split('\n')) {
      const entry = parseLogLine(line);
      if (entry && isAtLeast(entry, minLevel)) {
        entries.push(entry);
      }
    }
  }

  const count = options.lines && options.lines > 0 ? options.lines : 50;
  for (const entry of entries.slice(-count)) {
    console.log(formatLogEntry(entry, options.color !== false));
  }
}
