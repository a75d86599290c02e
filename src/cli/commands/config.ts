/**
 * Config command - View and edit configuration
 */

import { Command } from 'commander';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager, DEFAULT_CONFIG } from '../../config/config-manager.js';

export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show')
    .description('Show current configuration (token hidden)')
    .action(async () => {
      await showConfig();
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., logging.level debug)')
    .action(async (key: string, value: string) => {
      await setConfig(key, value);
    });

  cmd
    .command('get <key>')
    .description('Get a specific configuration value')
    .action(async (key: string) => {
      await getConfig(key);
    });

  cmd.action(async () => {
    await showConfig();
  });

  return cmd;
}

/**
 * Reads a command line value as a number or boolean when it looks like one
 */
export function parseConfigValue(value: string): unknown {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') {
    return numValue;
  }
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return value;
}

async function showConfig(): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  const result = await configManager.load();
  const config = result.success ? configManager.redacted() : DEFAULT_CONFIG;

  console.log(`Configuration (${configManager.path}):\n`);
  console.log(JSON.stringify(config, null, 2));

  if (!result.success && result.errors) {
    console.log('\nWarnings:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function setConfig(key: string, value: string): Promise<void> {
  if (key === 'qarnot.token') {
    console.error('The token is read from the QARNOT_TOKEN environment variable or a .env file, not stored in config.json.');
    process.exit(1);
  }

  const workspace = new Workspace();
  if (!(await workspace.exists())) {
    await workspace.initialize();
  }

  const configManager = new ConfigManager(workspace.configPath);
  await configManager.load();

  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

async function getConfig(key: string): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  await configManager.load();

  const value = key.startsWith('qarnot.token') ? undefined : configManager.get(key);
  if (value === undefined) {
    console.error(`Configuration key not found: ${key}`);
    process.exit(1);
  }

  if (typeof value === 'object') {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}
