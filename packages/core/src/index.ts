/**
 * @mediakit/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Format tokens and operation schemas
 * - Binary and engine configuration
 * - Process runner
 */

// Errors
export {
  MediaKitError,
  ValidationError,
  FileTooLargeError,
  NoAudioTrackError,
  DurationUnknownError,
  ExternalToolError,
  TimeoutError,
  ExecutionError,
  PipelineStepError,
  type ValidationCode,
} from './errors/index.js';

// Types
export {
  AUDIO_FORMATS,
  VIDEO_FORMATS,
  COMPRESSION_LEVELS,
  DEFAULT_AUDIO_FORMAT,
  isAudioFormat,
  isVideoFormat,
  type AudioFormat,
  type VideoFormat,
  type MediaKind,
  type CompressionLevel,
} from './types/formats.js';

export {
  operationSchema,
  segmentSchema,
  volumeAdjustmentSchema,
  validateOperation,
  type OperationSpec,
  type OperationKind,
  type OperationOf,
  type SegmentSpec,
  type VolumeAdjustment,
} from './types/operation.js';

// Binary Configuration
export {
  getBinariesConfig,
  binaries,
  resolveBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';

// Engine Configuration
export {
  loadEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
} from './config/engine.js';

// Process runner
export {
  ProcessRunner,
  type ToolRunner,
  type ToolInvocation,
  type ToolOutput,
} from './runner/processRunner.js';
