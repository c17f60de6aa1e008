/**
 * @mediakit/processing
 * 
 * Media operation layer.
 * 
 * RULES:
 * - Stream copy for cuts, re-encode only when the operation needs it
 * - Every FFmpeg invocation goes through the process runner
 * - Multi-step work happens in a private scratch directory
 */

// Operations facade
export {
  MediaOperations,
  type MediaOperationsOptions,
  type OperationResult,
  type CompressionResult,
  type SegmentResult,
  type ToolStatus,
} from './operations.js';

// FFmpeg wrapper
export { FFmpeg, type FFmpegRunOptions } from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  buildCommand,
  PIPE_INPUT,
  PIPE_OUTPUT,
  type CommandPlan,
  type AudioCodecOptions,
  type InputOptions,
  type OutputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Format presets
export {
  AUDIO_PRESETS,
  COMPRESSION_BITRATES_KBPS,
  FRAGMENTED_MOVFLAGS,
  audioPreset,
  compressionEncoding,
  type AudioFormatPreset,
  type CompressionEncoding,
} from './formats.js';

// Pipelines
export {
  PipelineOrchestrator,
  planTimeSegments,
  isValidSegment,
  manifestLine,
  type PipelineDeps,
  type SplitPart,
  type TimeRange,
  type InvalidSegmentPolicy,
} from './pipeline.js';

// Scratch space
export { ScratchSpaceManager, SCRATCH_PREFIX, type ScratchSpaceOptions } from './scratch.js';

// Downloader
export { AudioDownloader, type AudioDownloaderOptions, type DownloadResult } from './downloader.js';
