export { ObjectStoreClient, createS3Client, joinKey } from './services/ObjectStoreClient.js';
export type { ObjectStoreClientOptions, S3Sender } from './services/ObjectStoreClient.js';
export { MultipartUploadSession } from './services/MultipartUploadSession.js';
export type { MultipartRemote, MultipartSessionOptions, UploadSessionState } from './services/MultipartUploadSession.js';
export { SegmentedBufferView, segmentRange } from './services/SegmentedBufferView.js';
export { CountingSemaphore } from './services/CountingSemaphore.js';
export { AsyncOpGroup } from './services/AsyncOpGroup.js';
export { ReadGroup } from './services/ReadGroup.js';
export { WriteGroup } from './services/WriteGroup.js';
export { FaultPlan, injectedFault, randomFaults } from './services/FaultInjector.js';
export type {
  FaultInjector,
  FaultPoint,
  FaultRule,
  FaultSensitivity,
  FaultStage,
  RandomFaultOptions,
} from './services/FaultInjector.js';
export { ValidationService } from './services/ValidationService.js';
export { DEFAULT_STORAGE_CONFIG, loadConfig, validateConfig } from './utils/config.js';
export type { StorageConfig } from './utils/config.js';
export { ErrorHandler, S3Error, TransferError, ValidationError } from './utils/errorHandler.js';
export type { ErrorCode } from './utils/errorHandler.js';
export type {
  BufferPart,
  ByteRange,
  CompletedPartTag,
  HeadResult,
  RemoteOperation,
  SegmentLimits,
} from './types/storage.js';
export type { ValidationResult } from './types/validation.js';
