/**
 * Media Types
 */

/**
 * Facts the probe layer derives from a blob. Computed per request, never cached.
 */
export interface ProbeResult {
  /** Hz; the default rate when the probe could not tell */
  sampleRate: number;
  /** Undefined when the stream reports no bitrate */
  bitrateKbps?: number;
  /** Undefined when every duration tier failed */
  durationSeconds?: number;
  hasAudioTrack: boolean;
}

export interface ProbeBinaries {
  ffprobePath: string;
  ffmpegPath: string;
}

export interface ProbeTimeouts {
  probeTimeoutMs: number;
  decodeProbeTimeoutMs: number;
}
