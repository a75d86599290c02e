import { z } from 'zod';
import { QarnotError } from '../qarnot/errors.js';
import { TERMINAL_TASK_STATES, type TaskOutputStream } from '../qarnot/types.js';
import type { ConnectionProvider } from '../qarnot/connection.js';
import type { ToolDefinition, ToolSystem } from './tool-system.js';
import {
  toBucketEntry,
  toFileEntry,
  toJson,
  toTaskDetail,
  toTaskSummary,
} from './projections.js';

const taskUuid = z.string().min(1).describe('The UUID of the task');
const instanceId = z.number().int().min(0).optional()
  .describe('Optional instance ID for multi-instance tasks');
const bucketName = z.string().min(1).describe('The name of the bucket');

export const LIST_TASKS_TOOL = {
  name: 'list_tasks',
  description: 'List all Qarnot tasks for your account.',
  inputSchema: {},
} satisfies ToolDefinition;

export const GET_TASK_STATUS_TOOL = {
  name: 'get_task_status',
  description: 'Get detailed status of a specific Qarnot task, including SSH connection info of running instances.',
  inputSchema: { uuid: taskUuid },
} satisfies ToolDefinition;

export const GET_TASK_STDOUT_TOOL = {
  name: 'get_task_stdout',
  description: 'Get the standard output (stdout) of a Qarnot task.',
  inputSchema: { uuid: taskUuid, instance_id: instanceId },
} satisfies ToolDefinition;

export const GET_TASK_STDERR_TOOL = {
  name: 'get_task_stderr',
  description: 'Get the standard error (stderr) of a Qarnot task.',
  inputSchema: { uuid: taskUuid, instance_id: instanceId },
} satisfies ToolDefinition;

export const CANCEL_TASK_TOOL = {
  name: 'cancel_task',
  description: 'Cancel a running Qarnot task.',
  inputSchema: { uuid: taskUuid.describe('The UUID of the task to cancel') },
} satisfies ToolDefinition;

export const LIST_BUCKETS_TOOL = {
  name: 'list_buckets',
  description: 'List all storage buckets in your Qarnot account.',
  inputSchema: {},
} satisfies ToolDefinition;

export const LIST_BUCKET_FILES_TOOL = {
  name: 'list_bucket_files',
  description: 'List all files in a Qarnot storage bucket, with their size and last modification date.',
  inputSchema: { bucket_name: bucketName },
} satisfies ToolDefinition;

export const DOWNLOAD_RESULT_TOOL = {
  name: 'download_result',
  description: 'Download a file from a Qarnot bucket to your local machine. '
    + 'If the local path is not given in the prompt, ask for it.',
  inputSchema: {
    bucket_name: bucketName,
    remote_path: z.string().min(1).describe('The path of the file in the bucket'),
    local_path: z.string().min(1)
      .describe('Where to save the file locally; an existing directory receives the file under its remote name'),
  },
} satisfies ToolDefinition;

export const QARNOT_TOOLS: readonly ToolDefinition[] = [
  LIST_TASKS_TOOL,
  GET_TASK_STATUS_TOOL,
  GET_TASK_STDOUT_TOOL,
  GET_TASK_STDERR_TOOL,
  CANCEL_TASK_TOOL,
  LIST_BUCKETS_TOOL,
  LIST_BUCKET_FILES_TOOL,
  DOWNLOAD_RESULT_TOOL,
];

const EMPTY_OUTPUT: Record<TaskOutputStream, string> = {
  stdout: '(no output)',
  stderr: '(no error output)',
};

/**
 * Registers the Qarnot tools. The connection is taken from the provider on
 * every call, so it is created by the first call that needs it.
 */
export function createQarnotTools(toolSystem: ToolSystem, connections: ConnectionProvider): void {
  const readOutput = async (stream: TaskOutputStream, uuid: string, instance?: number): Promise<string> => {
    const output = await connections.get().taskOutput(uuid, stream, instance);
    return output || EMPTY_OUTPUT[stream];
  };

  toolSystem.register(LIST_TASKS_TOOL, async () => {
    const tasks = await connections.get().listTasks();
    return toJson(tasks.map(toTaskSummary));
  });

  toolSystem.register(GET_TASK_STATUS_TOOL, async ({ uuid }) => {
    const task = await connections.get().retrieveTask(uuid);
    return toJson(toTaskDetail(task));
  });

  toolSystem.register(GET_TASK_STDOUT_TOOL, async ({ uuid, instance_id }) =>
    readOutput('stdout', uuid, instance_id));

  toolSystem.register(GET_TASK_STDERR_TOOL, async ({ uuid, instance_id }) =>
    readOutput('stderr', uuid, instance_id));

  toolSystem.register(CANCEL_TASK_TOOL, async ({ uuid }) => {
    const service = connections.get();
    const task = await service.retrieveTask(uuid);

    if (TERMINAL_TASK_STATES.includes(task.state)) {
      throw new QarnotError(
        'invalid_state',
        `Task ${uuid} is already in state '${task.state}' and cannot be cancelled.`
      );
    }

    await service.abortTask(uuid);
    return `Task ${uuid} has been cancelled.`;
  });

  toolSystem.register(LIST_BUCKETS_TOOL, async () => {
    const buckets = await connections.get().listBuckets();
    return toJson(buckets.map(toBucketEntry));
  });

  toolSystem.register(LIST_BUCKET_FILES_TOOL, async ({ bucket_name }) => {
    const files = await connections.get().listBucketFiles(bucket_name);
    return toJson(files.map(toFileEntry));
  });

  toolSystem.register(DOWNLOAD_RESULT_TOOL, async ({ bucket_name, remote_path, local_path }) => {
    const written = await connections.get().downloadFile(bucket_name, remote_path, local_path);
    return `Downloaded '${remote_path}' from '${bucket_name}' to '${written}'`;
  });
}
