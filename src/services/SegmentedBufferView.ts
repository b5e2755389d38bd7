import type { BufferPart, ByteRange, SegmentLimits } from '../types/storage.js';
import { ValidationError } from '../utils/errorHandler.js';

function assertByteCount(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Partitions a byte range into contiguous parts of a fixed segment size.
 * The last part carries the remainder. Immutable: iterate it as often as
 * needed, e.g. to re-issue a transfer.
 */
export class SegmentedBufferView implements Iterable<BufferPart> {
  readonly parts: readonly BufferPart[];

  private constructor(
    readonly range: ByteRange,
    readonly segmentSize: number,
    parts: BufferPart[]
  ) {
    this.parts = Object.freeze(parts);
  }

  static build(range: ByteRange, segmentSize: number): SegmentedBufferView {
    assertByteCount(range.start, 'Range start');
    assertByteCount(range.size, 'Range size');
    if (!Number.isSafeInteger(segmentSize) || segmentSize <= 0) {
      throw new ValidationError(`Segment size must be a positive integer, got ${segmentSize}`);
    }

    const parts: BufferPart[] = [];
    const rangeEnd = range.start + range.size;
    for (let start = range.start; start < rangeEnd; start += segmentSize) {
      const index = parts.length;
      parts.push({
        index,
        partNumber: index + 1, // part numbers start at 1
        start,
        end: Math.min(start + segmentSize, rangeEnd),
        offset: start - range.start,
      });
    }
    return new SegmentedBufferView(range, segmentSize, parts);
  }

  get numSegments(): number {
    return this.parts.length;
  }

  [Symbol.iterator](): Iterator<BufferPart> {
    return this.parts[Symbol.iterator]();
  }

  /**
   * The slice of `buffer` a part reads from or writes into.
   * Slices of different parts never overlap.
   */
  static view(buffer: Uint8Array, part: BufferPart): Uint8Array {
    return buffer.subarray(part.offset, part.offset + (part.end - part.start));
  }
}

/**
 * Chooses a segment size that keeps the part count within the remote limit
 * and segments the range with it.
 *
 * Starts from the default segment size; when that would need more than
 * `maxMultipartCount` parts the segment is enlarged to the smallest size that
 * fits, which must still lie strictly between the minimum and maximum part
 * sizes.
 */
export function segmentRange(range: ByteRange, limits: SegmentLimits): SegmentedBufferView {
  assertByteCount(range.size, 'Range size');

  let segmentSize = limits.defaultSegmentSize;
  if (Math.ceil(range.size / segmentSize) > limits.maxMultipartCount) {
    segmentSize = Math.ceil(range.size / limits.maxMultipartCount);
    if (segmentSize <= limits.minSegmentSize || segmentSize >= limits.maxSegmentSize) {
      throw new ValidationError(
        `Cannot segment ${range.size} bytes into at most ${limits.maxMultipartCount} parts: ` +
          `segment of ${segmentSize} bytes is outside (${limits.minSegmentSize}, ${limits.maxSegmentSize})`
      );
    }
    console.log(
      `Adjusted segment size to ${segmentSize} bytes to stay under ${limits.maxMultipartCount} parts for ${range.size} bytes`
    );
  }

  return SegmentedBufferView.build(range, segmentSize);
}
