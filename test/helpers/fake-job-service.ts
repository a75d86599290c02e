import { Readable } from 'node:stream';
import { QarnotError } from '../../src/qarnot/errors.js';
import type { ObjectStore } from '../../src/qarnot/object-store.js';
import type {
  BucketObject,
  JobService,
  QarnotBucket,
  QarnotTask,
  TaskOutputStream,
} from '../../src/qarnot/types.js';

export function makeTask(overrides: Partial<QarnotTask> = {}): QarnotTask {
  return {
    uuid: 'task-1',
    name: 'render',
    state: 'FullyExecuting',
    progress: 42,
    instanceCount: 2,
    runningInstanceCount: 2,
    runningCoreCount: 16,
    executionTime: '00:10:00',
    wallTime: '00:05:00',
    creationDate: '2024-05-01T10:00:00Z',
    endDate: null,
    ...overrides,
  };
}

/**
 * In-memory storage: buckets map object keys to their bytes
 */
export class FakeObjectStore implements ObjectStore {
  readonly buckets = new Map<string, Map<string, Buffer>>();
  readonly creationDates = new Map<string, Date>();

  addObject(bucketName: string, key: string, content: Buffer | string): void {
    let bucket = this.buckets.get(bucketName);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(bucketName, bucket);
    }
    bucket.set(key, Buffer.isBuffer(content) ? content : Buffer.from(content));
  }

  addBucket(bucketName: string, creationDate?: Date): void {
    if (!this.buckets.has(bucketName)) {
      this.buckets.set(bucketName, new Map());
    }
    if (creationDate) {
      this.creationDates.set(bucketName, creationDate);
    }
  }

  async listBuckets(): Promise<QarnotBucket[]> {
    return [...this.buckets.keys()].map((name) => ({ name, creationDate: this.creationDates.get(name) }));
  }

  async listObjects(bucketName: string): Promise<BucketObject[]> {
    const bucket = this.bucket(bucketName);
    return [...bucket.entries()].map(([key, content]) => ({
      key,
      size: content.length,
      lastModified: new Date('2024-05-02T08:30:00Z'),
    }));
  }

  async getObject(bucketName: string, key: string): Promise<Readable> {
    const content = this.bucket(bucketName).get(key);
    if (!content) {
      throw new QarnotError('not_found', `Failed to get '${key}' from bucket '${bucketName}': The specified key does not exist.`, { status: 404 });
    }
    return Readable.from([content]);
  }

  private bucket(bucketName: string): Map<string, Buffer> {
    const bucket = this.buckets.get(bucketName);
    if (!bucket) {
      throw new QarnotError('not_found', `Failed to list bucket '${bucketName}': The specified bucket does not exist`, { status: 404 });
    }
    return bucket;
  }
}

/**
 * JobService over in-memory tasks and a {@link FakeObjectStore}
 */
export class FakeJobService implements JobService {
  readonly tasks = new Map<string, QarnotTask>();
  readonly outputs = new Map<string, string>();
  readonly aborted: string[] = [];
  readonly store = new FakeObjectStore();
  readonly downloads: Array<{ bucketName: string; remotePath: string; localPath: string }> = [];

  addTask(task: QarnotTask): void {
    this.tasks.set(task.uuid, task);
  }

  setOutput(uuid: string, stream: TaskOutputStream, text: string, instanceId?: number): void {
    this.outputs.set(outputKey(uuid, stream, instanceId), text);
  }

  async listTasks(): Promise<QarnotTask[]> {
    return [...this.tasks.values()];
  }

  async retrieveTask(uuid: string): Promise<QarnotTask> {
    const task = this.tasks.get(uuid);
    if (!task) {
      throw new QarnotError('not_found', 'No such task.', { status: 404 });
    }
    return task;
  }

  async taskOutput(uuid: string, stream: TaskOutputStream, instanceId?: number): Promise<string> {
    await this.retrieveTask(uuid);
    return this.outputs.get(outputKey(uuid, stream, instanceId)) ?? '';
  }

  async abortTask(uuid: string): Promise<void> {
    const task = await this.retrieveTask(uuid);
    this.aborted.push(uuid);
    this.tasks.set(uuid, { ...task, state: 'Cancelled' });
  }

  listBuckets(): Promise<QarnotBucket[]> {
    return this.store.listBuckets();
  }

  listBucketFiles(bucketName: string): Promise<BucketObject[]> {
    return this.store.listObjects(bucketName);
  }

  async downloadFile(bucketName: string, remotePath: string, localPath: string): Promise<string> {
    await this.store.getObject(bucketName, remotePath);
    this.downloads.push({ bucketName, remotePath, localPath });
    return `/downloads/${localPath}`;
  }
}

function outputKey(uuid: string, stream: TaskOutputStream, instanceId?: number): string {
  return `${uuid}:${stream}:${instanceId ?? 'all'}`;
}
