/**
 * A byte range over a caller-owned buffer
 */
export interface ByteRange {
  start: number;
  size: number;
}

/**
 * One contiguous slice of a larger transfer.
 * `start`/`end` are absolute object offsets (end exclusive), `offset` is the
 * position of `start` inside the caller's buffer.
 */
export interface BufferPart {
  index: number;
  partNumber: number;
  start: number;
  end: number;
  offset: number;
}

export interface SegmentLimits {
  defaultSegmentSize: number;
  minSegmentSize: number;
  maxSegmentSize: number;
  maxMultipartCount: number;
}

export type HeadResult = { exists: true; size: number } | { exists: false };

export interface CompletedPartTag {
  partNumber: number;
  eTag: string;
}

export type RemoteOperation =
  | 'HeadObject'
  | 'GetObject'
  | 'PutObject'
  | 'CreateMultipartUpload'
  | 'UploadPart'
  | 'CompleteMultipartUpload'
  | 'AbortMultipartUpload'
  | 'DeleteObjects'
  | 'ListObjectsV2';
