import { createWriteStream } from 'node:fs';
import { mkdir, stat, unlink } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { ComputeClient, type FetchFn } from './compute-client.js';
import { QarnotError } from './errors.js';
import { S3ObjectStore, createS3Client, type ObjectStore } from './object-store.js';
import type {
  BucketObject,
  JobService,
  QarnotBucket,
  QarnotTask,
  TaskOutputStream,
} from './types.js';

/**
 * Connection settings, as found in the `qarnot` section of the configuration
 */
export interface ConnectionSettings {
  token?: string;
  clusterUrl: string;
  storageUrl?: string;
}

export type ObjectStoreFactory = (compute: ComputeClient) => Promise<ObjectStore>;

/**
 * Resolves storage credentials from the compute API and builds the S3 store
 */
export function s3StoreFactory(token: string, storageUrl?: string): ObjectStoreFactory {
  return async (compute) => {
    const [email, endpoint] = await Promise.all([
      compute.userEmail(),
      storageUrl ? Promise.resolve(storageUrl) : compute.storageUrl(),
    ]);
    return new S3ObjectStore(createS3Client({
      endpoint,
      accessKeyId: email,
      secretAccessKey: token,
    }));
  };
}

/**
 * QarnotConnection - Authenticated handle on the compute and storage APIs
 *
 * The object store is resolved on first storage use and then reused.
 */
export class QarnotConnection implements JobService {
  private storePromise?: Promise<ObjectStore>;

  constructor(
    private readonly compute: ComputeClient,
    private readonly storeFactory: ObjectStoreFactory
  ) {}

  /**
   * Creates a connection from settings.
   * @throws QarnotError with code `configuration` when no token is set
   */
  static fromSettings(settings: ConnectionSettings, fetchFn?: FetchFn): QarnotConnection {
    const token = settings.token?.trim();
    if (!token) {
      throw new QarnotError('configuration', 'QARNOT_TOKEN environment variable is required');
    }
    const compute = new ComputeClient({ token, clusterUrl: settings.clusterUrl, fetch: fetchFn });
    return new QarnotConnection(compute, s3StoreFactory(token, settings.storageUrl));
  }

  listTasks(): Promise<QarnotTask[]> {
    return this.compute.listTasks();
  }

  retrieveTask(uuid: string): Promise<QarnotTask> {
    return this.compute.retrieveTask(uuid);
  }

  taskOutput(uuid: string, stream: TaskOutputStream, instanceId?: number): Promise<string> {
    return this.compute.taskOutput(uuid, stream, instanceId);
  }

  abortTask(uuid: string): Promise<void> {
    return this.compute.abortTask(uuid);
  }

  async listBuckets(): Promise<QarnotBucket[]> {
    const store = await this.store();
    return store.listBuckets();
  }

  async listBucketFiles(bucketName: string): Promise<BucketObject[]> {
    const store = await this.store();
    return store.listObjects(bucketName);
  }

  /**
   * Writes one object to disk. A directory target receives the file under
   * the object's base name; missing parent directories are created. A
   * transfer that fails midway leaves no file behind.
   */
  async downloadFile(bucketName: string, remotePath: string, localPath: string): Promise<string> {
    const store = await this.store();
    const body = await store.getObject(bucketName, remotePath);

    let target = resolve(localPath);
    let writing = false;
    try {
      if (await isDirectory(target)) {
        target = join(target, basename(remotePath));
      }
      await mkdir(dirname(target), { recursive: true });
      writing = true;
      await pipeline(body, createWriteStream(target));
    } catch (error) {
      body.destroy();
      let reason = error instanceof Error ? error.message : String(error);
      if (writing) {
        const leftover = await removePartialFile(target);
        if (leftover) reason += ` (partial file not removed: ${leftover})`;
      }
      throw new QarnotError('io', `Failed to write '${target}': ${reason}`, { cause: error });
    }
    return target;
  }

  private store(): Promise<ObjectStore> {
    if (!this.storePromise) {
      const pending = this.storeFactory(this.compute);
      this.storePromise = pending;
      // A failed resolution is not kept, the next storage call starts over.
      void pending.catch(() => {
        if (this.storePromise === pending) {
          this.storePromise = undefined;
        }
      });
    }
    return this.storePromise;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Deletes what a failed download wrote. Returns the reason when the file
 * could not be deleted.
 */
async function removePartialFile(path: string): Promise<string | undefined> {
  try {
    await unlink(path);
    return undefined;
  } catch (error) {
    if (isMissing(error)) return undefined;
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * ConnectionProvider - Holds the single connection of the process
 *
 * The connection is built on the first `get()`, so a missing token only
 * fails the first tool call that needs the service.
 */
export class ConnectionProvider {
  private connection?: JobService;

  constructor(private readonly factory: () => JobService) {}

  static fromSettings(settings: ConnectionSettings, fetchFn?: FetchFn): ConnectionProvider {
    return new ConnectionProvider(() => QarnotConnection.fromSettings(settings, fetchFn));
  }

  get(): JobService {
    if (!this.connection) {
      this.connection = this.factory();
    }
    return this.connection;
  }

  get initialized(): boolean {
    return this.connection !== undefined;
  }
}
