/**
 * Error classes and classification for the transfer engine
 */

export type ErrorCode =
  | 'NotFound'
  | 'WrongRegion'
  | 'TransientServiceError'
  | 'ServiceError'
  | 'PermissionDenied'
  | 'TypeError'
  | 'Fatal'
  | 'Unknown';

export class S3Error extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = 'ServiceError',
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'S3Error';
  }
}

export class TransferError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = 'Unknown',
    public readonly originalError?: unknown,
    public readonly label?: string
  ) {
    super(message);
    this.name = 'TransferError';
  }
}

export class ValidationError extends Error {
  readonly code: ErrorCode = 'TypeError';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Shape of the errors thrown by the AWS SDK and by Node's networking layer.
 * Everything is optional since a caught value may be anything.
 */
interface RemoteErrorLike {
  name?: unknown;
  code?: unknown;
  message?: unknown;
  $metadata?: { httpStatusCode?: unknown };
}

const NOT_FOUND_NAMES = ['NotFound', 'NoSuchKey', 'NoSuchBucket'];
const WRONG_REGION_NAMES = ['PermanentRedirect', 'AuthorizationHeaderMalformed'];
const PERMISSION_NAMES = ['AccessDenied', 'Forbidden', 'InvalidAccessKeyId', 'SignatureDoesNotMatch'];
const TRANSIENT_NAMES = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'NetworkingError',
  'TimeoutError',
  'RequestTimeout',
  'ServiceUnavailable',
  'InternalError',
  'SlowDown',
  'ThrottlingException',
  'RequestLimitExceeded',
];

function asRemoteError(error: unknown): RemoteErrorLike {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const remote: RemoteErrorLike = {};
  if ('name' in error) remote.name = error.name;
  if ('code' in error) remote.code = error.code;
  if ('message' in error) remote.message = error.message;
  if ('$metadata' in error) {
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      remote.$metadata = { httpStatusCode: metadata.httpStatusCode };
    }
  }
  return remote;
}

function textOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Error handler utility functions
 */
export class ErrorHandler {
  /**
   * Maps a raw remote status onto the engine's error taxonomy
   */
  static classifyS3Error(error: unknown): ErrorCode {
    const remote = asRemoteError(error);
    const name = textOf(remote.name) ?? '';
    const code = textOf(remote.code) ?? '';
    const status = remote.$metadata?.httpStatusCode;
    const matches = (names: string[]) => names.includes(name) || names.includes(code);

    if (status === 301 || matches(WRONG_REGION_NAMES)) {
      return 'WrongRegion';
    }
    if (status === 404 || matches(NOT_FOUND_NAMES)) {
      return 'NotFound';
    }
    if (status === 403 || matches(PERMISSION_NAMES)) {
      return 'PermissionDenied';
    }
    if (matches(TRANSIENT_NAMES) || (typeof status === 'number' && status >= 500)) {
      return 'TransientServiceError';
    }
    if (typeof status === 'number') {
      return 'ServiceError';
    }
    return 'Unknown';
  }

  /**
   * Converts anything thrown at a remote call site into an S3Error.
   * Errors the engine already classified pass through unchanged.
   */
  static handleS3Error(error: unknown, bucket?: string, key?: string): S3Error | TransferError | ValidationError {
    if (error instanceof S3Error || error instanceof TransferError || error instanceof ValidationError) {
      return error;
    }

    const location = bucket ? (key ? `[${bucket}] ${key}` : `[${bucket}]`) : 'remote store';
    const code = this.classifyS3Error(error);
    const detail = textOf(asRemoteError(error).message) ?? 'Unknown error';

    switch (code) {
      case 'WrongRegion':
        return new S3Error(`${location}: bucket lives in another region, reconfigure the client region`, code, error);
      case 'NotFound':
        return new S3Error(`${location} does not exist`, code, error);
      case 'PermissionDenied':
        return new S3Error(`Access denied to ${location}`, code, error);
      case 'TransientServiceError':
        return new S3Error(`S3 service temporarily unavailable for ${location}: ${detail}`, code, error);
      case 'ServiceError':
        return new S3Error(`S3 operation failed for ${location}: ${detail}`, code, error);
      default:
        return new S3Error(`S3 operation failed for ${location}: ${detail}`, 'Unknown', error);
    }
  }

  /**
   * Reads the error code off any error, classifying foreign ones
   */
  static codeOf(error: unknown): ErrorCode {
    if (error instanceof S3Error || error instanceof TransferError || error instanceof ValidationError) {
      return error.code;
    }
    return this.classifyS3Error(error);
  }

  /**
   * Determines if an error is worth retrying by the caller
   */
  static isRetryable(error: unknown): boolean {
    return this.codeOf(error) === 'TransientServiceError';
  }

  /**
   * Formats error for reporting
   */
  static formatErrorResponse(error: Error): {
    code: ErrorCode;
    message: string;
    retryable: boolean;
  } {
    return {
      code: this.codeOf(error),
      message: error.message,
      retryable: this.isRetryable(error),
    };
  }
}
