import type { BucketObject, QarnotBucket, QarnotTask } from '../qarnot/types.js';

/**
 * Output records of the tools. Keys are snake_case, as agents see them.
 */

export interface TaskSummary {
  uuid: string;
  name: string;
  state: string;
  progress: string;
  instance_count: number;
  running_instances: number;
  creation_date: string;
  end_date: string;
}

export interface SshConnection {
  instance_id: number;
  app_port: number;
  host: string;
  port: number;
  ssh_command: string | null;
}

export interface TaskDetail {
  uuid: string;
  name: string;
  state: string;
  progress: string;
  instance_count: number;
  running_instances: number;
  running_cores: number;
  execution_time: string;
  wall_time: string;
  creation_date: string;
  end_date: string;
  ssh_connections: SshConnection[] | string;
}

export interface BucketEntry {
  name: string;
  creation_date: string;
}

export interface FileEntry {
  path: string;
  size: number;
  last_modified: string;
}

export const NOT_AVAILABLE = 'N/A';
export const NO_SSH_FORWARDS = 'No active SSH forwards';

const SSH_PORT = 22;

function formatProgress(progress: number | undefined): string {
  return `${progress ?? 0}%`;
}

function orNotAvailable(value: string | null | undefined): string {
  return value ? value : NOT_AVAILABLE;
}

export function toTaskSummary(task: QarnotTask): TaskSummary {
  return {
    uuid: task.uuid,
    name: task.name,
    state: task.state,
    progress: formatProgress(task.progress),
    instance_count: task.instanceCount ?? 0,
    running_instances: task.runningInstanceCount ?? 0,
    creation_date: orNotAvailable(task.creationDate),
    end_date: orNotAvailable(task.endDate),
  };
}

/**
 * Active forwards of every running instance. Forwards of port 22 come
 * with a ready-to-use ssh command.
 */
export function toSshConnections(task: QarnotTask): SshConnection[] {
  const instances = task.status?.runningInstancesInfo?.perRunningInstanceInfo ?? [];
  const connections: SshConnection[] = [];

  for (const instance of instances) {
    for (const forward of instance.activeForwards ?? []) {
      connections.push({
        instance_id: instance.instanceId,
        app_port: forward.applicationPort,
        host: forward.forwarderHost,
        port: forward.forwarderPort,
        ssh_command: forward.applicationPort === SSH_PORT
          ? `ssh -p ${forward.forwarderPort} user@${forward.forwarderHost}`
          : null,
      });
    }
  }

  return connections;
}

export function toTaskDetail(task: QarnotTask): TaskDetail {
  const ssh = toSshConnections(task);
  return {
    uuid: task.uuid,
    name: task.name,
    state: task.state,
    progress: formatProgress(task.progress),
    instance_count: task.instanceCount ?? 0,
    running_instances: task.runningInstanceCount ?? 0,
    running_cores: task.runningCoreCount ?? 0,
    execution_time: orNotAvailable(task.executionTime),
    wall_time: orNotAvailable(task.wallTime),
    creation_date: orNotAvailable(task.creationDate),
    end_date: orNotAvailable(task.endDate),
    ssh_connections: ssh.length > 0 ? ssh : NO_SSH_FORWARDS,
  };
}

export function toBucketEntry(bucket: QarnotBucket): BucketEntry {
  return {
    name: bucket.name,
    creation_date: bucket.creationDate ? bucket.creationDate.toISOString() : NOT_AVAILABLE,
  };
}

export function toFileEntry(object: BucketObject): FileEntry {
  return {
    path: object.key,
    size: object.size,
    last_modified: object.lastModified ? object.lastModified.toISOString() : NOT_AVAILABLE,
  };
}

/**
 * Serializes a tool result the way every structured tool returns it
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
