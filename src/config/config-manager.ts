import { z } from 'zod';
import { readFile, writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Configuration schema
 */
export const QarnotMcpConfigSchema = z.object({
  qarnot: z.object({
    token: z.string().min(1).optional(),
    clusterUrl: z.string().url().default('https://api.qarnot.com'),
    storageUrl: z.string().url().optional(),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** Log directory; the workspace logs/ directory when unset. */
    path: z.string().min(1).optional(),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

export type QarnotMcpConfig = z.infer<typeof QarnotMcpConfigSchema>;

export type PartialQarnotMcpConfig = z.input<typeof QarnotMcpConfigSchema>;

export const DEFAULT_CONFIG: QarnotMcpConfig = QarnotMcpConfigSchema.parse({});

/**
 * Environment variables and the config paths they override
 */
export const ENV_MAPPINGS: Record<string, string[]> = {
  QARNOT_TOKEN: ['qarnot', 'token'],
  QARNOT_CLUSTER_URL: ['qarnot', 'clusterUrl'],
  QARNOT_STORAGE_URL: ['qarnot', 'storageUrl'],
  QARNOT_MCP_LOGGING_LEVEL: ['logging', 'level'],
  QARNOT_MCP_LOGGING_PATH: ['logging', 'path'],
  QARNOT_MCP_LOGGING_MAX_SIZE: ['logging', 'maxSize'],
  QARNOT_MCP_LOGGING_MAX_FILES: ['logging', 'maxFiles'],
};

const NUMERIC_KEYS = new Set(['maxSize', 'maxFiles']);

const REDACTED = '[redacted]';

export interface ConfigValidationResult {
  success: boolean;
  config?: QarnotMcpConfig;
  errors?: string[];
}

type ConfigTree = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * ConfigManager - Loads, validates and persists configuration
 *
 * Precedence: defaults, then the JSON file, then environment variables.
 * Only the file layer is ever written back, so a token given through the
 * environment never lands on disk.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: QarnotMcpConfig;
  private fileLayer: ConfigTree = {};

  constructor(configPath: string) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
  }

  get config(): QarnotMcpConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<ConfigValidationResult> {
    let content: string | undefined;
    try {
      content = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    if (content !== undefined) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        return {
          success: false,
          errors: [`Failed to parse config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
      if (!isRecord(parsed)) {
        return { success: false, errors: ['Config file must contain a JSON object'] };
      }
      this.fileLayer = parsed;
    }

    return this.validate(deepMerge(this.fileLayer, this.getEnvironmentOverrides()));
  }

  /**
   * Validates a partial configuration and, on success, makes the result
   * (defaults filled in) the current configuration
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = QarnotMcpConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return { success: false, errors };
  }

  /**
   * Writes the file layer atomically
   */
  async save(): Promise<void> {
    await this.atomicWrite(this.configPath, JSON.stringify(this.fileLayer, null, 2));
  }

  /**
   * Writes through a temp file and a rename
   */
  async atomicWrite(filePath: string, content: string): Promise<void> {
    const dir = dirname(filePath);
    const tempPath = join(dir, `.config-${randomUUID()}.tmp`);

    await mkdir(dir, { recursive: true, mode: 0o700 });
    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!(cleanupError instanceof Error && 'code' in cleanupError && cleanupError.code === 'ENOENT')) {
          throw cleanupError;
        }
      });
      throw error;
    }
  }

  getEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): ConfigTree {
    const overrides: ConfigTree = {};

    for (const [envVar, path] of Object.entries(ENV_MAPPINGS)) {
      const value = env[envVar];
      if (value !== undefined && value !== '') {
        setNestedValue(overrides, path, parseEnvValue(value, path));
      }
    }

    return overrides;
  }

  /**
   * Reads a value by dotted path, e.g. `logging.level`
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a value in the file layer by dotted path. The change is kept only
   * when the resulting configuration validates.
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const nextFile = deepMerge({}, this.fileLayer);
    setNestedValue(nextFile, path.split('.'), value);

    const result = this.validate(deepMerge(nextFile, this.getEnvironmentOverrides()));
    if (result.success) {
      this.fileLayer = nextFile;
    }
    return result;
  }

  /**
   * Current configuration with the token hidden, for display
   */
  redacted(): QarnotMcpConfig {
    const { qarnot } = this.currentConfig;
    return {
      ...this.currentConfig,
      qarnot: { ...qarnot, token: qarnot.token ? REDACTED : undefined },
    };
  }
}

function parseEnvValue(value: string, path: string[]): unknown {
  const key = path[path.length - 1] ?? '';
  if (NUMERIC_KEYS.has(key)) {
    const num = Number(value);
    // A non-numeric value is left as a string for the schema to reject.
    return Number.isNaN(num) ? value : num;
  }
  return value;
}

function setNestedValue(obj: ConfigTree, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Deep merges two trees into a new one; values of `overrides` win
 */
function deepMerge(base: ConfigTree, overrides: ConfigTree): ConfigTree {
  const result: ConfigTree = {};

  for (const [key, value] of Object.entries(base)) {
    result[key] = isRecord(value) ? deepMerge({}, value) : value;
  }

  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else if (isRecord(value)) {
      result[key] = deepMerge({}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
