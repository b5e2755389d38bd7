import type { ByteRange } from '../types/storage.js';
import type { ValidationResult } from '../types/validation.js';
import { ValidationError } from '../utils/errorHandler.js';

const MAX_KEY_BYTES = 1024;
const CONTROL_CHARS = /[\x00-\x1F\x7F]/;

export class ValidationService {
  /**
   * Validates a bucket name. Naming rules differ between S3-compatible
   * stores, so only names no store accepts are rejected.
   *
   * Rules:
   * - Must not be empty
   * - Must not contain whitespace or control characters
   */
  static validateBucketName(bucketName: string): ValidationResult {
    if (!bucketName) {
      return { isValid: false, error: 'Bucket name is required' };
    }

    if (CONTROL_CHARS.test(bucketName)) {
      return { isValid: false, error: 'Bucket name must not contain control characters' };
    }

    if (/\s/.test(bucketName)) {
      return { isValid: false, error: 'Bucket name must not contain whitespace' };
    }

    return { isValid: true };
  }

  /**
   * Validates a listing or delete prefix. Empty means the whole bucket.
   */
  static validateKeyPrefix(keyPrefix: string): ValidationResult {
    if (keyPrefix === '') {
      return { isValid: true };
    }

    if (Buffer.byteLength(keyPrefix, 'utf8') > MAX_KEY_BYTES) {
      return { isValid: false, error: `Key prefix must not exceed ${MAX_KEY_BYTES} bytes` };
    }

    if (CONTROL_CHARS.test(keyPrefix)) {
      return { isValid: false, error: 'Key prefix must not contain control characters' };
    }

    return { isValid: true };
  }

  /**
   * Validates an object key
   *
   * Rules:
   * - Must not be empty
   * - Must not exceed 1024 bytes of UTF-8
   * - Must not contain control characters
   */
  static validateObjectKey(key: string): ValidationResult {
    if (!key) {
      return { isValid: false, error: 'Object key must not be empty' };
    }

    if (Buffer.byteLength(key, 'utf8') > MAX_KEY_BYTES) {
      return { isValid: false, error: `Object key must not exceed ${MAX_KEY_BYTES} bytes` };
    }

    if (CONTROL_CHARS.test(key)) {
      return { isValid: false, error: 'Object key must not contain control characters' };
    }

    return { isValid: true };
  }

  /**
   * A byte range needs a non-negative integer start and size
   */
  static validateRange(range: ByteRange): ValidationResult {
    for (const [what, value] of [['start', range.start], ['size', range.size]] as const) {
      if (!Number.isSafeInteger(value) || value < 0) {
        return { isValid: false, error: `Range ${what} must be a non-negative integer, got ${value}` };
      }
    }
    return { isValid: true };
  }

  /**
   * Throws a ValidationError for the first failed result
   */
  static assertValid(...results: ValidationResult[]): void {
    for (const result of results) {
      if (!result.isValid) {
        throw new ValidationError(result.error ?? 'Invalid request');
      }
    }
  }
}
