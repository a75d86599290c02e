import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { Workspace, LOG_FILENAME, expandHome } from '../../storage/workspace.js';
import { ConfigManager, type QarnotMcpConfig } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { ToolSystem } from '../../tools/tool-system.js';
import { createQarnotTools } from '../../tools/qarnot-tools.js';
import { ConnectionProvider } from '../../qarnot/connection.js';

const PackageSchema = z.object({ version: z.string() });

/**
 * Version from the package.json at the project root
 */
export function readPackageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  try {
    const parsed = PackageSchema.safeParse(JSON.parse(readFileSync(join(here, '../../../package.json'), 'utf-8')));
    return parsed.success ? parsed.data.version : '0.1.0';
  } catch {
    return '0.1.0';
  }
}

/**
 * Log file the configuration points at
 */
export function resolveLogPath(workspace: Workspace, config: QarnotMcpConfig): string {
  return config.logging.path
    ? join(expandHome(config.logging.path), LOG_FILENAME)
    : workspace.logPath();
}

export interface Runtime {
  workspace: Workspace;
  config: QarnotMcpConfig;
  logger: Logger;
  toolSystem: ToolSystem;
  connections: ConnectionProvider;
}

/**
 * Loads configuration and wires the logger, the connection and the tools.
 * No remote call happens here; the connection is created by the first tool
 * call that needs it.
 * @throws Error when the configuration is invalid
 */
export async function loadRuntime(workspace: Workspace = new Workspace()): Promise<Runtime> {
  const configManager = new ConfigManager(workspace.configPath);
  const result = await configManager.load();
  if (!result.success || !result.config) {
    throw new Error(`Configuration error:\n${(result.errors ?? []).join('\n')}`);
  }
  const config = result.config;

  const logger = new Logger({
    level: config.logging.level,
    path: resolveLogPath(workspace, config),
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
  });

  const toolSystem = new ToolSystem(logger);
  const connections = ConnectionProvider.fromSettings(config.qarnot);
  createQarnotTools(toolSystem, connections);

  return { workspace, config, logger, toolSystem, connections };
}
