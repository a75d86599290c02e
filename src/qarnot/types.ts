/**
 * Remote record shapes returned by the Qarnot compute API and the
 * storage endpoint, and the service interface the tools depend on.
 */

/**
 * A port of a running instance exposed on a forwarder host
 */
export interface ActiveForward {
  applicationPort: number;
  forwarderHost: string;
  forwarderPort: number;
}

export interface RunningInstanceInfo {
  instanceId: number;
  activeForwards?: ActiveForward[];
}

export interface TaskStatus {
  runningInstancesInfo?: {
    perRunningInstanceInfo?: RunningInstanceInfo[];
  } | null;
}

/**
 * Task as returned by `GET /tasks` and `GET /tasks/{uuid}`
 */
export interface QarnotTask {
  uuid: string;
  name: string;
  state: string;
  progress?: number;
  instanceCount?: number;
  runningInstanceCount?: number;
  runningCoreCount?: number;
  executionTime?: string;
  wallTime?: string;
  creationDate?: string;
  endDate?: string | null;
  status?: TaskStatus | null;
}

export interface QarnotBucket {
  name: string;
  creationDate?: Date;
}

export interface BucketObject {
  key: string;
  size: number;
  lastModified?: Date;
}

/**
 * Which output stream of a task to read
 */
export type TaskOutputStream = 'stdout' | 'stderr';

/**
 * Task states after which a task can no longer be aborted
 */
export const TERMINAL_TASK_STATES: readonly string[] = ['Cancelled', 'Success', 'Failure'];

/**
 * JobService - The slice of the Qarnot platform the tools call
 *
 * Implementations raise {@link QarnotError} for every remote failure.
 */
export interface JobService {
  listTasks(): Promise<QarnotTask[]>;
  retrieveTask(uuid: string): Promise<QarnotTask>;
  taskOutput(uuid: string, stream: TaskOutputStream, instanceId?: number): Promise<string>;
  abortTask(uuid: string): Promise<void>;
  listBuckets(): Promise<QarnotBucket[]>;
  listBucketFiles(bucketName: string): Promise<BucketObject[]>;
  /**
   * Downloads one object and returns the local path written.
   */
  downloadFile(bucketName: string, remotePath: string, localPath: string): Promise<string>;
}
