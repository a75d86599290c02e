/**
 * qarnot-mcp - Qarnot tasks and storage as MCP tools
 */

export { Workspace, expandHome } from './storage/workspace.js';
export {
  ConfigManager,
  QarnotMcpConfigSchema,
  DEFAULT_CONFIG,
  type QarnotMcpConfig,
  type PartialQarnotMcpConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export {
  ToolSystem,
  createQarnotTools,
  QARNOT_TOOLS,
  type ToolDefinition,
  type ToolArgs,
  type ToolCall,
  type ToolResult,
  type ToolError,
  type ToolErrorType,
  type ToolHandler,
  type TaskSummary,
  type TaskDetail,
  type SshConnection,
  type BucketEntry,
  type FileEntry,
} from './tools/index.js';

export {
  QarnotConnection,
  ConnectionProvider,
  ComputeClient,
  S3ObjectStore,
  QarnotError,
  isQarnotError,
  type JobService,
  type ObjectStore,
  type QarnotTask,
  type QarnotBucket,
  type BucketObject,
  type QarnotErrorCode,
  type ConnectionSettings,
} from './qarnot/index.js';

export {
  createMcpServer,
  serveStdio,
  toCallToolResult,
  toMcpTool,
  type McpServerInfo,
} from './server/mcp-server.js';

export {
  Logger,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
  type LogEntry,
} from './logging/logger.js';
