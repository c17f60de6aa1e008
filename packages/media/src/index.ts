/**
 * @mediakit/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Probe blobs with ffprobe over stdin
 * - Resolve duration through ordered fallback tiers
 * - Detect the presence of an audio track
 */

export { FFProbe, type ProbeQuery } from './probes/ffprobe.js';
export { MediaProbe, type MediaProbeOptions } from './probes/mediaProbe.js';
export {
  createDurationStrategies,
  measureDuration,
  type DurationStrategy,
  type DurationStrategyDeps,
} from './probes/duration.js';
export { parseLastClockTime, parsePositiveNumber, firstLine, lastLine } from './parsers.js';
export type { ProbeResult, ProbeBinaries, ProbeTimeouts } from './types.js';
