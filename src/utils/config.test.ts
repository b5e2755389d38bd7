import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_STORAGE_CONFIG, loadConfig, validateConfig } from './config.js';
import { ValidationError } from './errorHandler.js';

const MB = 1024 * 1024;

/**
 * Tests for environment-driven storage configuration
 */
describe('loadConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use the defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({ ...DEFAULT_STORAGE_CONFIG, endpoint: undefined });
    expect(config.workerThreads).toBe(36);
    expect(config.defaultSegmentSize).toBe(8 * MB);
    expect(config.maxDeleteBatch).toBe(995);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should prefer AWS_DEFAULT_REGION over AWS_REGION', () => {
    expect(loadConfig({ AWS_DEFAULT_REGION: 'eu-west-1', AWS_REGION: 'us-west-2' }).region).toBe('eu-west-1');
    expect(loadConfig({ AWS_REGION: 'us-west-2' }).region).toBe('us-west-2');
  });

  it('should switch to path-style addressing for a test endpoint', () => {
    const config = loadConfig({ STORAGE_TEST_ENDPOINT: 'http://localhost:9000' });
    expect(config.endpoint).toBe('http://localhost:9000');
    expect(config.forcePathStyle).toBe(true);
  });

  it('should use a configured worker count', () => {
    expect(loadConfig({ STORAGE_WORKER_THREADS: '8' }).workerThreads).toBe(8);
  });

  it('should clamp a worker count below the minimum', () => {
    expect(loadConfig({ STORAGE_WORKER_THREADS: '0' }).workerThreads).toBe(1);
    expect(console.warn).toHaveBeenCalledWith('STORAGE_WORKER_THREADS value 0 is below minimum 1, using minimum');
  });

  it('should clamp a worker count above the maximum', () => {
    expect(loadConfig({ STORAGE_WORKER_THREADS: '1000' }).workerThreads).toBe(256);
    expect(console.warn).toHaveBeenCalledWith('STORAGE_WORKER_THREADS value 1000 exceeds maximum 256, using maximum');
  });

  it('should fall back to the default for a value that is not a number', () => {
    expect(loadConfig({ STORAGE_MAX_ATTEMPTS: 'many' }).maxAttempts).toBe(3);
    expect(console.warn).toHaveBeenCalledWith('Invalid STORAGE_MAX_ATTEMPTS value "many", using default 3');
  });

  it('should fall back to the default for a fractional value', () => {
    expect(loadConfig({ STORAGE_WORKER_THREADS: '2.5' }).workerThreads).toBe(36);
  });

  it('should keep the segment size inside the part size limits', () => {
    expect(loadConfig({ STORAGE_SEGMENT_SIZE: String(16 * MB) }).defaultSegmentSize).toBe(16 * MB);
    expect(loadConfig({ STORAGE_SEGMENT_SIZE: '1024' }).defaultSegmentSize).toBe(5 * MB);
  });

  it('should read the fatal callback switch', () => {
    expect(loadConfig({ STORAGE_FATAL_ON_CALLBACK_FAILURE: 'true' }).fatalOnCallbackFailure).toBe(true);
    expect(loadConfig({ STORAGE_FATAL_ON_CALLBACK_FAILURE: 'off' }).fatalOnCallbackFailure).toBe(false);
    expect(loadConfig({ STORAGE_FATAL_ON_CALLBACK_FAILURE: 'maybe' }).fatalOnCallbackFailure).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(
      'Invalid STORAGE_FATAL_ON_CALLBACK_FAILURE value "maybe", using default false'
    );
  });

  it('should apply overrides last', () => {
    const config = loadConfig({ STORAGE_WORKER_THREADS: '8' }, { workerThreads: 2, maxDeleteBatch: 10 });
    expect(config.workerThreads).toBe(2);
    expect(config.maxDeleteBatch).toBe(10);
  });

  it('should validate overrides', () => {
    expect(() => loadConfig({}, { minSegmentSize: 16 * MB })).toThrow(
      `defaultSegmentSize (${8 * MB}) is below minSegmentSize (${16 * MB})`
    );
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_STORAGE_CONFIG)).toBe(DEFAULT_STORAGE_CONFIG);
  });

  it('should reject non-positive counts', () => {
    expect(() => validateConfig({ ...DEFAULT_STORAGE_CONFIG, maxDeleteBatch: 0 })).toThrow(
      'maxDeleteBatch must be a positive integer, got 0'
    );
  });

  it('should reject a default segment above the maximum', () => {
    expect(() => validateConfig({ ...DEFAULT_STORAGE_CONFIG, maxSegmentSize: 6 * MB })).toThrow(
      `defaultSegmentSize (${8 * MB}) exceeds maxSegmentSize (${6 * MB})`
    );
  });

  it('should reject an empty region', () => {
    expect(() => validateConfig({ ...DEFAULT_STORAGE_CONFIG, region: '' })).toThrow(ValidationError);
  });
});
