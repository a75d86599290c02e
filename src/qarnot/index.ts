/**
 * Qarnot platform access
 */

export { QarnotConnection, ConnectionProvider, s3StoreFactory, type ConnectionSettings } from './connection.js';
export { ComputeClient, type FetchFn } from './compute-client.js';
export { S3ObjectStore, createS3Client, toStorageError, type ObjectStore } from './object-store.js';
export { QarnotError, isQarnotError, codeForStatus, type QarnotErrorCode } from './errors.js';
export {
  TERMINAL_TASK_STATES,
  type JobService,
  type QarnotTask,
  type QarnotBucket,
  type BucketObject,
  type TaskOutputStream,
} from './types.js';
