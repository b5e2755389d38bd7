import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { SegmentedBufferView, segmentRange } from './SegmentedBufferView.js';
import { ValidationError } from '../utils/errorHandler.js';
import type { SegmentLimits } from '../types/storage.js';

describe('SegmentedBufferView', () => {
  it('should split a range into fixed segments with the remainder last', () => {
    const view = SegmentedBufferView.build({ start: 0, size: 10 }, 4);

    expect(view.numSegments).toBe(3);
    expect(view.parts).toEqual([
      { index: 0, partNumber: 1, start: 0, end: 4, offset: 0 },
      { index: 1, partNumber: 2, start: 4, end: 8, offset: 4 },
      { index: 2, partNumber: 3, start: 8, end: 10, offset: 8 },
    ]);
  });

  it('should keep absolute offsets for ranges that do not start at zero', () => {
    const view = SegmentedBufferView.build({ start: 100, size: 6 }, 4);

    expect(view.parts).toEqual([
      { index: 0, partNumber: 1, start: 100, end: 104, offset: 0 },
      { index: 1, partNumber: 2, start: 104, end: 106, offset: 4 },
    ]);
  });

  it('should produce no parts for an empty range', () => {
    const view = SegmentedBufferView.build({ start: 42, size: 0 }, 8);
    expect(view.numSegments).toBe(0);
    expect([...view]).toEqual([]);
  });

  it('should be iterable more than once with the same result', () => {
    const view = SegmentedBufferView.build({ start: 0, size: 9 }, 2);
    expect([...view]).toEqual([...view]);
    expect(Object.isFrozen(view.parts)).toBe(true);
  });

  it('should reject a non-positive segment size', () => {
    expect(() => SegmentedBufferView.build({ start: 0, size: 10 }, 0)).toThrow(ValidationError);
    expect(() => SegmentedBufferView.build({ start: 0, size: 10 }, 0)).toThrow(
      'Segment size must be a positive integer, got 0'
    );
  });

  it('should reject negative or fractional ranges', () => {
    expect(() => SegmentedBufferView.build({ start: -1, size: 10 }, 4)).toThrow(
      'Range start must be a non-negative integer, got -1'
    );
    expect(() => SegmentedBufferView.build({ start: 0, size: 2.5 }, 4)).toThrow(
      'Range size must be a non-negative integer, got 2.5'
    );
  });

  it('should hand out non-overlapping views of the caller buffer', () => {
    const buffer = new Uint8Array(10);
    const view = SegmentedBufferView.build({ start: 500, size: 10 }, 4);

    view.parts.forEach((part) => SegmentedBufferView.view(buffer, part).fill(part.partNumber));

    expect(Array.from(buffer)).toEqual([1, 1, 1, 1, 2, 2, 2, 2, 3, 3]);
  });

  /**
   * Property: for any range and segment size, the parts are contiguous,
   * cover the range exactly, and only the last one may be short.
   */
  it('should cover every range contiguously', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 100000 }),
        fc.integer({ min: 0, max: 20000 }),
        fc.integer({ min: 1, max: 3000 }),
        (start, size, segmentSize) => {
          const view = SegmentedBufferView.build({ start, size }, segmentSize);

          expect(view.numSegments).toBe(Math.ceil(size / segmentSize));
          let expectedStart = start;
          view.parts.forEach((part, index) => {
            expect(part.index).toBe(index);
            expect(part.partNumber).toBe(index + 1);
            expect(part.start).toBe(expectedStart);
            expect(part.offset).toBe(part.start - start);
            expect(part.end).toBeGreaterThan(part.start);
            expect(part.end - part.start).toBeLessThanOrEqual(segmentSize);
            if (index < view.numSegments - 1) {
              expect(part.end - part.start).toBe(segmentSize);
            }
            expectedStart = part.end;
          });
          expect(expectedStart).toBe(start + size);
        }
      ),
      { numRuns: 200 }
    );
  });
});

describe('segmentRange', () => {
  const limits: SegmentLimits = {
    defaultSegmentSize: 4,
    minSegmentSize: 2,
    maxSegmentSize: 100,
    maxMultipartCount: 3,
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use the default segment size while the part count fits', () => {
    const view = segmentRange({ start: 0, size: 12 }, limits);
    expect(view.segmentSize).toBe(4);
    expect(view.numSegments).toBe(3);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should enlarge the segment when the default would need too many parts', () => {
    const view = segmentRange({ start: 0, size: 20 }, limits);

    expect(view.segmentSize).toBe(7);
    expect(view.parts.map((part) => part.end - part.start)).toEqual([7, 7, 6]);
    expect(console.log).toHaveBeenCalledWith('Adjusted segment size to 7 bytes to stay under 3 parts for 20 bytes');
  });

  it('should refuse a segment size at or above the maximum', () => {
    expect(() => segmentRange({ start: 0, size: 1000 }, limits)).toThrow(
      'Cannot segment 1000 bytes into at most 3 parts: segment of 334 bytes is outside (2, 100)'
    );
  });

  it('should refuse a segment size at or below the minimum', () => {
    expect(() => segmentRange({ start: 0, size: 20 }, { ...limits, minSegmentSize: 7 })).toThrow(ValidationError);
  });

  it('should segment an empty range into nothing', () => {
    expect(segmentRange({ start: 0, size: 0 }, limits).numSegments).toBe(0);
  });

  /**
   * Property: whatever the size, the chosen segmentation never exceeds the
   * multipart part limit.
   */
  it('should never exceed the part limit', () => {
    const roomy: SegmentLimits = {
      defaultSegmentSize: 1024,
      minSegmentSize: 512,
      maxSegmentSize: 1024 * 1024 * 1024,
      maxMultipartCount: 16,
    };

    fc.assert(
      fc.property(fc.integer({ min: 0, max: 500000 }), (size) => {
        const view = segmentRange({ start: 0, size }, roomy);
        expect(view.numSegments).toBeLessThanOrEqual(16);
        const covered = view.parts.reduce((total, part) => total + (part.end - part.start), 0);
        expect(covered).toBe(size);
      }),
      { numRuns: 200 }
    );
  });
});
