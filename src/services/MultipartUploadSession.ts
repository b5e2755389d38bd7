import type { BufferPart, CompletedPartTag } from '../types/storage.js';
import { ErrorHandler, TransferError } from '../utils/errorHandler.js';
import { CountingSemaphore } from './CountingSemaphore.js';
import { SegmentedBufferView } from './SegmentedBufferView.js';

type CreateOutcome = { ok: true; uploadId: string } | { ok: false; error: unknown };

export type UploadSessionState = 'Created' | 'Initiating' | 'Uploading' | 'Completing' | 'Done' | 'Failed';

/**
 * The remote calls a multipart session is made of
 */
export interface MultipartRemote {
  createMultipartUpload(bucket: string, key: string): Promise<string>;
  uploadPart(bucket: string, key: string, uploadId: string, partNumber: number, data: Uint8Array): Promise<string>;
  completeMultipartUpload(bucket: string, key: string, uploadId: string, parts: CompletedPartTag[]): Promise<void>;
  abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void>;
}

export interface MultipartSessionOptions {
  /**
   * Escalate part failures to `onFatal` as well as failing the session
   */
  fatalOnCallbackFailure?: boolean;
  onFatal?: (error: TransferError) => void;
}

/**
 * Turns one large put into create -> parallel part uploads -> complete.
 *
 * Each phase is an explicit transition so that callers can overlap the
 * phases of many objects: begin() all of them, then uploadParts() all of
 * them, then complete() all of them.
 */
export class MultipartUploadSession {
  private stateValue: UploadSessionState = 'Created';
  private uploadIdValue = '';
  private createRequest: Promise<CreateOutcome> | undefined;
  private readonly partTags: Array<string | undefined>;
  private readonly semaphore = new CountingSemaphore();
  private inflight: Array<Promise<void>> = [];
  private firstError: unknown;
  private failedParts = 0;

  constructor(
    private readonly remote: MultipartRemote,
    readonly bucket: string,
    readonly key: string,
    private readonly data: Uint8Array,
    readonly parts: readonly BufferPart[],
    private readonly options: MultipartSessionOptions = {}
  ) {
    this.partTags = new Array<string | undefined>(parts.length).fill(undefined);
  }

  get state(): UploadSessionState {
    return this.stateValue;
  }

  get uploadId(): string {
    return this.uploadIdValue;
  }

  /**
   * Created -> Initiating: asks for an upload id without waiting for it
   */
  begin(): void {
    this.expectState('Created', 'begin');
    this.stateValue = 'Initiating';
    this.createRequest = this.remote.createMultipartUpload(this.bucket, this.key).then(
      (uploadId): CreateOutcome => ({ ok: true, uploadId }),
      (error: unknown): CreateOutcome => ({ ok: false, error })
    );
  }

  /**
   * Initiating -> Uploading: waits for the upload id and dispatches every
   * part. Does not wait for the parts themselves.
   */
  async uploadParts(): Promise<void> {
    this.expectState('Initiating', 'uploadParts');
    if (!this.createRequest) {
      throw new TransferError(`Multipart upload of ${this.key} has no create request`, 'Fatal');
    }

    const created = await this.createRequest;
    if (!created.ok) {
      this.stateValue = 'Failed';
      console.error(`Failed to create multipart upload for [${this.bucket}] ${this.key}:`, created.error);
      throw ErrorHandler.handleS3Error(created.error, this.bucket, this.key);
    }
    this.uploadIdValue = created.uploadId;

    this.stateValue = 'Uploading';
    this.semaphore.setGoal(this.parts.length);
    this.inflight = this.parts.map((part) => this.dispatchPart(part));
  }

  /**
   * Uploading -> Completing -> Done: waits for every part, then finalizes
   * the object from the part tags in part-number order
   */
  async complete(): Promise<void> {
    this.expectState('Uploading', 'complete');

    await this.semaphore.waitUntilZero();
    await Promise.all(this.inflight);
    this.inflight = [];

    if (this.failedParts > 0) {
      await this.fail();
      throw new TransferError(
        `Multipart upload of [${this.bucket}] ${this.key} failed: ${this.failedParts} of ${this.parts.length} parts did not upload`,
        ErrorHandler.codeOf(this.firstError),
        this.firstError,
        this.key
      );
    }

    this.stateValue = 'Completing';
    try {
      await this.remote.completeMultipartUpload(this.bucket, this.key, this.uploadIdValue, this.manifest());
    } catch (error) {
      console.error(`Failed to complete multipart upload for [${this.bucket}] ${this.key}:`, error);
      await this.fail();
      throw ErrorHandler.handleS3Error(error, this.bucket, this.key);
    }

    this.stateValue = 'Done';
    console.log(`Completed multipart upload of [${this.bucket}] ${this.key} with ${this.parts.length} parts`);
  }

  async run(): Promise<void> {
    this.begin();
    await this.uploadParts();
    await this.complete();
  }

  /**
   * The completion manifest, ordered by part number
   */
  manifest(): CompletedPartTag[] {
    return this.parts.map((part) => {
      const eTag = this.partTags[part.index];
      if (eTag === undefined) {
        throw new TransferError(`Part ${part.partNumber} of ${this.key} has no completion tag`, 'Fatal');
      }
      return { partNumber: part.partNumber, eTag };
    });
  }

  private dispatchPart(part: BufferPart): Promise<void> {
    const body = SegmentedBufferView.view(this.data, part);
    return this.remote.uploadPart(this.bucket, this.key, this.uploadIdValue, part.partNumber, body).then(
      (eTag) => {
        this.partTags[part.index] = eTag;
        this.semaphore.decrementOne();
      },
      (error: unknown) => {
        try {
          this.recordPartFailure(part, error);
        } finally {
          this.semaphore.decrementOne();
        }
        this.raiseFatal(part, error);
      }
    );
  }

  private recordPartFailure(part: BufferPart, error: unknown): void {
    this.failedParts++;
    if (this.failedParts === 1) {
      this.firstError = error;
    }
    console.error(
      `Upload of part ${part.partNumber} failed for [${this.bucket}] ${this.key} (upload id ${this.uploadIdValue}):`,
      error instanceof Error ? error.message : error
    );
  }

  /**
   * Hands a part failure to the fatal handler. Runs after the part has been
   * counted down, and a throwing handler cannot stall or replace the
   * session's own failure.
   */
  private raiseFatal(part: BufferPart, error: unknown): void {
    if (!this.options.fatalOnCallbackFailure || !this.options.onFatal) {
      return;
    }
    try {
      this.options.onFatal(
        new TransferError(
          `Upload of part ${part.partNumber} failed for [${this.bucket}] ${this.key}`,
          'Fatal',
          error,
          this.key
        )
      );
    } catch (handlerError) {
      console.error(`Fatal handler failed for part ${part.partNumber} of [${this.bucket}] ${this.key}:`, handlerError);
    }
  }

  private async fail(): Promise<void> {
    this.stateValue = 'Failed';
    if (!this.uploadIdValue) {
      return;
    }
    try {
      await this.remote.abortMultipartUpload(this.bucket, this.key, this.uploadIdValue);
    } catch (abortError) {
      // Keep the original failure as the reported one
      console.warn(`Failed to abort multipart upload ${this.uploadIdValue}:`, abortError);
    }
  }

  private expectState(expected: UploadSessionState, phase: string): void {
    if (this.stateValue !== expected) {
      throw new TransferError(
        `Cannot ${phase} multipart upload of ${this.key} in state ${this.stateValue} (expected ${expected})`,
        'Fatal'
      );
    }
  }
}
