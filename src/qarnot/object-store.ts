import { Readable } from 'node:stream';
import {
  S3Client,
  S3ServiceException,
  ListBucketsCommand,
  ListObjectsV2Command,
  GetObjectCommand,
} from '@aws-sdk/client-s3';
import { QarnotError, type QarnotErrorCode } from './errors.js';
import type { BucketObject, QarnotBucket } from './types.js';

/**
 * ObjectStore - Read-only view of the account's storage
 */
export interface ObjectStore {
  listBuckets(): Promise<QarnotBucket[]>;
  listObjects(bucketName: string): Promise<BucketObject[]>;
  getObject(bucketName: string, key: string): Promise<Readable>;
}

export interface S3StoreConfig {
  /** Storage endpoint, e.g. https://storage.qarnot.com */
  endpoint: string;
  /** Account e-mail. */
  accessKeyId: string;
  /** Account token. */
  secretAccessKey: string;
}

const NOT_FOUND_ERRORS = new Set(['NoSuchBucket', 'NoSuchKey', 'NotFound']);
const UNAUTHORIZED_ERRORS = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch']);

/**
 * Builds the S3 client for the storage endpoint.
 *
 * The endpoint serves buckets by path, and the region is not meaningful to
 * it but the signer needs one.
 */
export function createS3Client(config: S3StoreConfig): S3Client {
  return new S3Client({
    region: 'us-east-1',
    endpoint: config.endpoint,
    forcePathStyle: true,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

/**
 * Converts an S3 failure into a {@link QarnotError}
 */
export function toStorageError(error: unknown, action: string): QarnotError {
  if (error instanceof QarnotError) return error;

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    let code: QarnotErrorCode = 'service';
    if (NOT_FOUND_ERRORS.has(error.name) || status === 404) {
      code = 'not_found';
    } else if (UNAUTHORIZED_ERRORS.has(error.name) || status === 401 || status === 403) {
      code = 'unauthorized';
    }
    const detail = error.message || error.name;
    return new QarnotError(code, `${action}: ${detail}`, { status, cause: error });
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new QarnotError('service', `${action}: ${reason}`, { cause: error });
}

/**
 * S3ObjectStore - {@link ObjectStore} over the S3-compatible storage API
 */
export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async listBuckets(): Promise<QarnotBucket[]> {
    try {
      const output = await this.client.send(new ListBucketsCommand({}));
      const buckets: QarnotBucket[] = [];
      for (const bucket of output.Buckets ?? []) {
        if (!bucket.Name) continue;
        buckets.push({ name: bucket.Name, creationDate: bucket.CreationDate });
      }
      return buckets;
    } catch (error) {
      throw toStorageError(error, 'Failed to list buckets');
    }
  }

  /**
   * Lists every object of a bucket, following continuation tokens
   */
  async listObjects(bucketName: string): Promise<BucketObject[]> {
    const objects: BucketObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const output = await this.client.send(new ListObjectsV2Command({
          Bucket: bucketName,
          ContinuationToken: continuationToken,
        }));
        for (const entry of output.Contents ?? []) {
          if (entry.Key === undefined) continue;
          objects.push({ key: entry.Key, size: entry.Size ?? 0, lastModified: entry.LastModified });
        }
        continuationToken = output.IsTruncated ? output.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw toStorageError(error, `Failed to list bucket '${bucketName}'`);
    }

    return objects;
  }

  async getObject(bucketName: string, key: string): Promise<Readable> {
    const action = `Failed to get '${key}' from bucket '${bucketName}'`;
    try {
      const output = await this.client.send(new GetObjectCommand({ Bucket: bucketName, Key: key }));
      const body = output.Body;
      if (body === undefined) {
        throw new QarnotError('service', `${action}: empty response body`);
      }
      if (body instanceof Readable) {
        return body;
      }
      return Readable.from([Buffer.from(await body.transformToByteArray())]);
    } catch (error) {
      throw toStorageError(error, action);
    }
  }
}
