import { mkdir, access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve, isAbsolute } from 'node:path';

/**
 * Default workspace directory, under the user's home
 */
const DEFAULT_WORKSPACE_ROOT = '.qarnot-mcp';

/**
 * Environment variable that moves the workspace elsewhere
 */
export const WORKSPACE_ENV = 'QARNOT_MCP_HOME';

export const LOG_FILENAME = 'qarnot-mcp.log';

const WORKSPACE_DIRS = ['logs'] as const;

/**
 * Expands a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Workspace - The ~/.qarnot-mcp/ directory holding config.json and logs/
 */
export class Workspace {
  private readonly rootPath: string;

  /**
   * @param rootPath - Custom root (defaults to $QARNOT_MCP_HOME, then ~/.qarnot-mcp/)
   */
  constructor(rootPath?: string) {
    const chosen = rootPath ?? process.env[WORKSPACE_ENV];
    if (chosen) {
      const expanded = expandHome(chosen);
      this.rootPath = isAbsolute(expanded) ? expanded : resolve(expanded);
    } else {
      this.rootPath = join(homedir(), DEFAULT_WORKSPACE_ROOT);
    }
  }

  get root(): string {
    return this.rootPath;
  }

  /**
   * Creates the workspace and its subdirectories, readable by the owner only
   */
  async initialize(): Promise<void> {
    await mkdir(this.rootPath, { recursive: true, mode: 0o700 });

    for (const dir of WORKSPACE_DIRS) {
      await mkdir(join(this.rootPath, dir), { recursive: true, mode: 0o700 });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.rootPath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  get configPath(): string {
    return join(this.rootPath, 'config.json');
  }

  get logsDir(): string {
    return join(this.rootPath, 'logs');
  }

  /**
   * Path of a file in the logs directory
   */
  logPath(filename: string = LOG_FILENAME): string {
    if (filename.includes('/') || filename.includes('\\') || filename.includes('..')) {
      throw new Error(`Invalid log filename: ${filename}`);
    }
    return join(this.logsDir, filename);
  }
}
