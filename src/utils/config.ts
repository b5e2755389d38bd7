import type { SegmentLimits } from '../types/storage.js';
import { ValidationError } from './errorHandler.js';

const MB = 1024 * 1024;
const GB = 1024 * MB;

export interface StorageConfig extends SegmentLimits {
  region: string;
  /** Test endpoint (e.g. a local S3 emulator); switches to path-style addressing */
  endpoint?: string;
  forcePathStyle: boolean;
  /** Size of the HTTP connection pool remote requests run on */
  workerThreads: number;
  /** Attempts the SDK transport makes per request */
  maxAttempts: number;
  requestTimeoutMs: number;
  connectionTimeoutMs: number;
  maxDeleteBatch: number;
  /** Escalate asynchronous part failures to the fatal handler */
  fatalOnCallbackFailure: boolean;
}

// Limits from https://docs.aws.amazon.com/AmazonS3/latest/userguide/qfacts.html,
// default segment size as the aws cli uses.
export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  region: 'us-east-1',
  forcePathStyle: false,
  workerThreads: 36,
  maxAttempts: 3,
  requestTimeoutMs: 300000,
  connectionTimeoutMs: 60000,
  defaultSegmentSize: 8 * MB,
  minSegmentSize: 5 * MB,
  maxSegmentSize: 5 * GB,
  maxMultipartCount: 10000,
  // DeleteObjects takes up to 1000 keys, stay a little under
  maxDeleteBatch: 995,
  fatalOnCallbackFailure: false,
};

const MIN_WORKER_THREADS = 1;
const MAX_WORKER_THREADS = 256;
const MIN_ATTEMPTS = 1;
const MAX_ATTEMPTS = 10;

type Environment = Record<string, string | undefined>;

/**
 * Reads an integer setting, warning and falling back to the default when it
 * is not a number and clamping it into [min, max]
 */
function parseIntegerSetting(env: Environment, name: string, defaultValue: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const parsedValue = Number(raw.trim());
  if (!Number.isSafeInteger(parsedValue)) {
    console.warn(`Invalid ${name} value "${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  if (parsedValue < min) {
    console.warn(`${name} value ${parsedValue} is below minimum ${min}, using minimum`);
    return min;
  }
  if (parsedValue > max) {
    console.warn(`${name} value ${parsedValue} exceeds maximum ${max}, using maximum`);
    return max;
  }
  return parsedValue;
}

function parseBooleanSetting(env: Environment, name: string, defaultValue: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return defaultValue;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  console.warn(`Invalid ${name} value "${raw}", using default ${defaultValue}`);
  return defaultValue;
}

/**
 * Rejects settings the segmenter and the batching code cannot work with
 */
export function validateConfig(config: StorageConfig): StorageConfig {
  const counts: Array<[string, number]> = [
    ['workerThreads', config.workerThreads],
    ['maxAttempts', config.maxAttempts],
    ['defaultSegmentSize', config.defaultSegmentSize],
    ['minSegmentSize', config.minSegmentSize],
    ['maxSegmentSize', config.maxSegmentSize],
    ['maxMultipartCount', config.maxMultipartCount],
    ['maxDeleteBatch', config.maxDeleteBatch],
  ];
  for (const [name, value] of counts) {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new ValidationError(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (config.defaultSegmentSize < config.minSegmentSize) {
    throw new ValidationError(
      `defaultSegmentSize (${config.defaultSegmentSize}) is below minSegmentSize (${config.minSegmentSize})`
    );
  }
  if (config.defaultSegmentSize > config.maxSegmentSize) {
    throw new ValidationError(
      `defaultSegmentSize (${config.defaultSegmentSize}) exceeds maxSegmentSize (${config.maxSegmentSize})`
    );
  }
  if (!config.region) {
    throw new ValidationError('region must not be empty');
  }
  return config;
}

/**
 * Builds the storage configuration from the environment.
 *
 * The region comes from AWS_DEFAULT_REGION, then AWS_REGION, then us-east-1.
 * STORAGE_TEST_ENDPOINT points the client at an emulator and turns on
 * path-style URLs, which emulators usually require.
 */
export function loadConfig(env: Environment = process.env, overrides: Partial<StorageConfig> = {}): StorageConfig {
  const endpoint = env.STORAGE_TEST_ENDPOINT?.trim() || undefined;
  const defaults = DEFAULT_STORAGE_CONFIG;

  const config: StorageConfig = {
    ...defaults,
    region: env.AWS_DEFAULT_REGION?.trim() || env.AWS_REGION?.trim() || defaults.region,
    endpoint,
    forcePathStyle: endpoint !== undefined,
    workerThreads: parseIntegerSetting(
      env,
      'STORAGE_WORKER_THREADS',
      defaults.workerThreads,
      MIN_WORKER_THREADS,
      MAX_WORKER_THREADS
    ),
    maxAttempts: parseIntegerSetting(env, 'STORAGE_MAX_ATTEMPTS', defaults.maxAttempts, MIN_ATTEMPTS, MAX_ATTEMPTS),
    defaultSegmentSize: parseIntegerSetting(
      env,
      'STORAGE_SEGMENT_SIZE',
      defaults.defaultSegmentSize,
      defaults.minSegmentSize,
      defaults.maxSegmentSize
    ),
    fatalOnCallbackFailure: parseBooleanSetting(
      env,
      'STORAGE_FATAL_ON_CALLBACK_FAILURE',
      defaults.fatalOnCallbackFailure
    ),
    ...overrides,
  };

  return validateConfig(config);
}
