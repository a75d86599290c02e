/**
 * Tool System - Tool registration, validation, and execution
 */

export {
  ToolSystem,
  type ToolDefinition,
  type ToolArgs,
  type ToolCall,
  type ToolResult,
  type ToolError,
  type ToolErrorType,
  type ToolHandler,
} from './tool-system.js';

export {
  createQarnotTools,
  QARNOT_TOOLS,
  LIST_TASKS_TOOL,
  GET_TASK_STATUS_TOOL,
  GET_TASK_STDOUT_TOOL,
  GET_TASK_STDERR_TOOL,
  CANCEL_TASK_TOOL,
  LIST_BUCKETS_TOOL,
  LIST_BUCKET_FILES_TOOL,
  DOWNLOAD_RESULT_TOOL,
} from './qarnot-tools.js';

export type {
  TaskSummary,
  TaskDetail,
  SshConnection,
  BucketEntry,
  FileEntry,
} from './projections.js';
