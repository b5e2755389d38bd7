import http from 'http';
import https from 'https';
import {
  S3Client,
  HeadObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  DeleteObjectsCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import type { BufferPart, ByteRange, CompletedPartTag, HeadResult, RemoteOperation } from '../types/storage.js';
import { loadConfig, type StorageConfig } from '../utils/config.js';
import { ErrorHandler, S3Error, TransferError, ValidationError } from '../utils/errorHandler.js';
import { CountingSemaphore } from './CountingSemaphore.js';
import type { FaultInjector, FaultSensitivity } from './FaultInjector.js';
import { MultipartUploadSession, type MultipartRemote } from './MultipartUploadSession.js';
import { SegmentedBufferView, segmentRange } from './SegmentedBufferView.js';
import { ValidationService } from './ValidationService.js';

const CONTENT_TYPE = 'application/octet-stream';

export type S3Sender = Pick<S3Client, 'send'>;

export interface ObjectStoreClientOptions {
  /** Preconfigured client; built from the storage config when omitted */
  client?: S3Sender;
  faultInjector?: FaultInjector;
  /** Called for asynchronous part failures when fatalOnCallbackFailure is set */
  onFatal?: (error: TransferError) => void;
}

type RequestOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

function exitOnFatal(error: TransferError): void {
  console.error('Fatal transfer failure, exiting:', error.message, error.originalError);
  process.exit(1);
}

/**
 * Joins a prefix and a name with exactly one separator
 */
export function joinKey(prefix: string, name: string): string {
  if (!prefix) {
    return name;
  }
  return prefix.endsWith('/') ? prefix + name : `${prefix}/${name}`;
}

/**
 * Builds the S3 client the way the transfer engine needs it: keep-alive
 * agents sized to the worker pool, timeouts at the transport level.
 */
export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    // Emulators only understand path-style URLs
    forcePathStyle: config.forcePathStyle,
    maxAttempts: config.maxAttempts,
    requestHandler: {
      requestTimeout: config.requestTimeoutMs,
      connectionTimeout: config.connectionTimeoutMs,
      httpAgent: new http.Agent({ keepAlive: true, maxSockets: config.workerThreads }),
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets: config.workerThreads }),
    },
  });
}

/**
 * Request layer over the remote object store: existence checks, segmented
 * reads and writes, batched deletes and paged listings.
 */
export class ObjectStoreClient implements MultipartRemote {
  readonly config: StorageConfig;
  private readonly s3Client: S3Sender;
  private readonly faultInjector?: FaultInjector;
  private readonly onFatal: (error: TransferError) => void;

  constructor(config: StorageConfig = loadConfig(), options: ObjectStoreClientOptions = {}) {
    this.config = config;
    this.s3Client = options.client ?? createS3Client(config);
    this.faultInjector = options.faultInjector;
    this.onFatal = options.onFatal ?? exitOnFatal;
  }

  /**
   * Size of an object. A missing object is a normal result, not an error.
   */
  async headSize(bucket: string, key: string): Promise<HeadResult> {
    this.validateObject(bucket, key);
    try {
      const response = await this.call('HeadObject', bucket, key, () =>
        this.s3Client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }))
      );
      return { exists: true, size: response.ContentLength ?? 0 };
    } catch (error) {
      if (ErrorHandler.codeOf(error) === 'NotFound') {
        return { exists: false };
      }
      console.error(`HeadObject failed for [${bucket}] ${key}:`, error);
      throw error;
    }
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    const head = await this.headSize(bucket, key);
    return head.exists;
  }

  /**
   * Writes an object, in one request below the default segment size and as
   * a multipart upload otherwise
   */
  async put(bucket: string, key: string, data: Uint8Array): Promise<void> {
    if (data.length < this.config.defaultSegmentSize) {
      return this.putSingle(bucket, key, data);
    }
    return this.putMultipart(bucket, key, data);
  }

  async putSingle(bucket: string, key: string, data: Uint8Array): Promise<void> {
    this.validateObject(bucket, key);
    try {
      await this.call('PutObject', bucket, key, () =>
        this.s3Client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: data,
            ContentLength: data.length,
            ContentType: CONTENT_TYPE,
          })
        )
      );
    } catch (error) {
      console.error(`Upload failed for [${bucket}] ${key}:`, error);
      throw error;
    }
  }

  /**
   * Writes an object through the full create/upload/complete protocol, even
   * when it fits in a single part
   */
  async putMultipart(bucket: string, key: string, data: Uint8Array): Promise<void> {
    const session = this.startMultipart(bucket, key, data);
    await session.uploadParts();
    await session.complete();
  }

  /**
   * Segments `data` and begins a multipart session for it. The caller drives
   * the remaining phases, which lets many objects' phases overlap.
   */
  startMultipart(bucket: string, key: string, data: Uint8Array): MultipartUploadSession {
    this.validateObject(bucket, key);
    if (data.length === 0) {
      throw new ValidationError(`Multipart upload of [${bucket}] ${key} needs a non-empty payload`);
    }

    const view = segmentRange({ start: 0, size: data.length }, this.config);
    console.log(
      `Starting multipart upload of [${bucket}] ${key}: ${data.length} bytes in ${view.numSegments} parts of ${view.segmentSize} bytes`
    );
    const session = new MultipartUploadSession(this, bucket, key, data, view.parts, {
      fatalOnCallbackFailure: this.config.fatalOnCallbackFailure,
      onFatal: this.onFatal,
    });
    session.begin();
    return session;
  }

  /**
   * Reads `range` of an object into `dest`, one ranged request per segment.
   * Each segment writes only its own slice of `dest`.
   */
  async get(bucket: string, key: string, range: ByteRange, dest: Uint8Array): Promise<void> {
    this.validateObject(bucket, key);
    ValidationService.assertValid(ValidationService.validateRange(range));
    if (dest.length < range.size) {
      throw new ValidationError(`Destination holds ${dest.length} bytes, range needs ${range.size}`);
    }

    const view = segmentRange(range, this.config);
    if (view.numSegments === 0) {
      return;
    }
    if (view.numSegments === 1) {
      await this.getPart(bucket, key, view.parts[0], dest);
      return;
    }

    const semaphore = new CountingSemaphore();
    semaphore.setGoal(view.numSegments);
    const failures: unknown[] = [];
    const inflight = view.parts.map((part) =>
      this.getPart(bucket, key, part, dest).then(
        () => semaphore.decrementOne(),
        (error: unknown) => {
          failures.push(error);
          semaphore.decrementOne();
          this.reportCallbackFailure(`Download of bytes ${part.start}-${part.end - 1} failed for [${bucket}] ${key}`, error);
        }
      )
    );
    await semaphore.waitUntilZero();
    await Promise.all(inflight);

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  /**
   * Same requests as get(), returned as a promise of the filled buffer so it
   * can be tracked by a ReadGroup
   */
  async getAsync(bucket: string, key: string, range: ByteRange, dest?: Uint8Array): Promise<Uint8Array> {
    ValidationService.assertValid(ValidationService.validateRange(range));
    const buffer = dest ?? new Uint8Array(range.size);
    await this.get(bucket, key, range, buffer);
    return buffer;
  }

  /**
   * Deletes `keys` (joined to `prefix` when given) in batches. Every batch is
   * sent even if an earlier one failed; the first failure is thrown at the
   * end.
   */
  async delete(bucket: string, keys: Iterable<string>, prefix?: string): Promise<void> {
    this.validatePrefix(bucket, prefix ?? '');
    const objectKeys = Array.from(keys, (name) => (prefix ? joinKey(prefix, name) : name));
    if (objectKeys.length === 0) {
      return;
    }

    let failure: { error: unknown } | undefined;
    const batchLimit = this.config.maxDeleteBatch;
    for (let i = 0; i < objectKeys.length; i += batchLimit) {
      const batch = objectKeys.slice(i, i + batchLimit);
      try {
        await this.sendDelete(bucket, batch);
      } catch (error) {
        console.error(`Delete batch of ${batch.length} keys failed for [${bucket}], first key ${batch[0]}:`, error);
        if (!failure) {
          failure = { error };
        }
      }
    }

    if (failure) {
      throw failure.error;
    }
  }

  /**
   * Collects the names under the directory `prefix`, relative to it, into
   * `names`. Keys that merely share the prefix's characters (`settings/x`
   * under `set`) are not listed.
   */
  async list(bucket: string, prefix: string, names: Set<string> = new Set()): Promise<Set<string>> {
    this.validatePrefix(bucket, prefix);
    const directory = prefix && !prefix.endsWith('/') ? `${prefix}/` : prefix;

    let continuationToken: string | undefined;
    do {
      const token = continuationToken;
      const response = await this.call('ListObjectsV2', bucket, directory, () =>
        this.s3Client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: directory,
            ContinuationToken: token,
          })
        )
      );

      for (const entry of response.Contents ?? []) {
        if (entry.Key?.startsWith(directory)) {
          names.add(entry.Key.slice(directory.length));
        }
      }

      continuationToken = undefined;
      if (response.IsTruncated) {
        continuationToken = response.NextContinuationToken;
        if (!continuationToken) {
          throw new S3Error(`Listing of [${bucket}] ${prefix} is truncated but has no continuation token`, 'ServiceError');
        }
      }
    } while (continuationToken);

    return names;
  }

  /**
   * Creates a multipart upload
   * Returns the upload ID
   */
  async createMultipartUpload(bucket: string, key: string): Promise<string> {
    const response = await this.call('CreateMultipartUpload', bucket, key, () =>
      this.s3Client.send(new CreateMultipartUploadCommand({ Bucket: bucket, Key: key, ContentType: CONTENT_TYPE }))
    );
    if (!response.UploadId) {
      throw new S3Error(`Failed to create multipart upload for [${bucket}] ${key}: no upload ID returned`, 'ServiceError');
    }
    return response.UploadId;
  }

  /**
   * Uploads a single part of a multipart upload
   * Returns the ETag for the uploaded part
   */
  async uploadPart(bucket: string, key: string, uploadId: string, partNumber: number, data: Uint8Array): Promise<string> {
    const response = await this.call('UploadPart', bucket, key, () =>
      this.s3Client.send(
        new UploadPartCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          PartNumber: partNumber,
          Body: data,
          ContentLength: data.length,
        })
      )
    );
    if (!response.ETag) {
      throw new S3Error(`Failed to upload part ${partNumber} of [${bucket}] ${key}: no ETag returned`, 'ServiceError');
    }
    return response.ETag;
  }

  async completeMultipartUpload(bucket: string, key: string, uploadId: string, parts: CompletedPartTag[]): Promise<void> {
    // S3 requires parts in ascending PartNumber order
    const sortedParts = [...parts].sort((a, b) => a.partNumber - b.partNumber);
    await this.call(
      'CompleteMultipartUpload',
      bucket,
      key,
      () =>
        this.s3Client.send(
          new CompleteMultipartUploadCommand({
            Bucket: bucket,
            Key: key,
            UploadId: uploadId,
            MultipartUpload: {
              Parts: sortedParts.map((part) => ({ PartNumber: part.partNumber, ETag: part.eTag })),
            },
          })
        ),
      'High'
    );
  }

  /**
   * Aborts a multipart upload. Cleanup only: failures are logged, never
   * thrown, so they cannot mask the error that caused the abort.
   */
  async abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void> {
    try {
      await this.call('AbortMultipartUpload', bucket, key, () =>
        this.s3Client.send(new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId }))
      );
      console.log(`Aborted multipart upload ${uploadId} for [${bucket}] ${key}`);
    } catch (error) {
      console.error(`Failed to abort multipart upload ${uploadId}:`, error instanceof Error ? error.message : error);
      if (ErrorHandler.codeOf(error) === 'NotFound') {
        console.warn('Upload already aborted or completed');
      }
    }
  }

  private async getPart(bucket: string, key: string, part: BufferPart, dest: Uint8Array): Promise<void> {
    const expected = part.end - part.start;
    const bytes = await this.call('GetObject', bucket, key, async () => {
      // HTTP ranges are inclusive
      const response = await this.s3Client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key, Range: `bytes=${part.start}-${part.end - 1}` })
      );
      if (!response.Body) {
        throw new S3Error(`GetObject for [${bucket}] ${key} returned no body`, 'ServiceError');
      }
      return response.Body.transformToByteArray();
    });

    if (bytes.length !== expected) {
      throw new S3Error(
        `Short read of [${bucket}] ${key} bytes ${part.start}-${part.end - 1}: expected ${expected} bytes, got ${bytes.length}`,
        'ServiceError'
      );
    }
    SegmentedBufferView.view(dest, part).set(bytes);
  }

  private async sendDelete(bucket: string, batch: string[]): Promise<void> {
    const response = await this.call(
      'DeleteObjects',
      bucket,
      undefined,
      () =>
        this.s3Client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: batch.map((key) => ({ Key: key })), Quiet: true },
          })
        ),
      'High'
    );

    const errors = response.Errors ?? [];
    if (errors.length > 0) {
      const first = errors[0];
      throw new S3Error(
        `${errors.length} of ${batch.length} keys failed to delete from [${bucket}], first ${first.Key}: ${first.Code} ${first.Message ?? ''}`.trimEnd(),
        'ServiceError'
      );
    }
    console.log(`Deleted ${batch.length} keys from [${bucket}]`);
  }

  /**
   * Every remote request goes through here: fault hooks before and after,
   * and errors mapped onto the engine's taxonomy. The `after` hook sees
   * failed requests too; if it throws, its error replaces the request's.
   */
  private async call<T>(
    operation: RemoteOperation,
    bucket: string,
    key: string | undefined,
    request: () => Promise<T>,
    sensitivity: FaultSensitivity = 'Normal'
  ): Promise<T> {
    try {
      await this.faultInjector?.({ operation, stage: 'before', sensitivity, bucket, key });
      let outcome: RequestOutcome<T>;
      try {
        outcome = { ok: true, value: await request() };
      } catch (error) {
        outcome = { ok: false, error };
      }
      await this.faultInjector?.({ operation, stage: 'after', sensitivity, bucket, key, failed: !outcome.ok });
      if (!outcome.ok) {
        throw outcome.error;
      }
      return outcome.value;
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, bucket, key);
    }
  }

  /**
   * Logs a failed segment and, in fatal mode, hands it to the fatal handler.
   * A throwing handler is logged; the transfer still reports the segment's
   * own error.
   */
  private reportCallbackFailure(message: string, error: unknown): void {
    console.error(`${message}:`, error instanceof Error ? error.message : error);
    if (!this.config.fatalOnCallbackFailure) {
      return;
    }
    try {
      this.onFatal(new TransferError(message, 'Fatal', error));
    } catch (handlerError) {
      console.error(`Fatal handler failed: ${message}:`, handlerError);
    }
  }

  private validateObject(bucket: string, key: string): void {
    ValidationService.assertValid(
      ValidationService.validateBucketName(bucket),
      ValidationService.validateObjectKey(key)
    );
  }

  private validatePrefix(bucket: string, prefix: string): void {
    ValidationService.assertValid(
      ValidationService.validateBucketName(bucket),
      ValidationService.validateKeyPrefix(prefix)
    );
  }

}
