/**
 * Engine Configuration
 *
 * Timeouts and housekeeping settings, read from the environment.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  PROBE_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
  DECODE_PROBE_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('30000'),
  TRANSCODE_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('300000'),
  SCRATCH_MAX_AGE_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('3600000'),
  DEFAULT_SAMPLE_RATE: z.string().transform(Number).pipe(z.number().int().positive()).default('44100'),
});

export interface EngineConfig {
  /** Metadata probes (sample rate, bitrate, stream type, container duration) */
  probeTimeoutMs: number;
  /** Probes that read or decode the whole stream */
  decodeProbeTimeoutMs: number;
  transcodeTimeoutMs: number;
  scratchMaxAgeMs: number;
  defaultSampleRate: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  probeTimeoutMs: 10000,
  decodeProbeTimeoutMs: 30000,
  transcodeTimeoutMs: 300000,
  scratchMaxAgeMs: 3600000,
  defaultSampleRate: 44100,
});

/**
 * Read the engine settings from an environment map
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.parse(env);
  return {
    probeTimeoutMs: parsed.PROBE_TIMEOUT_MS,
    decodeProbeTimeoutMs: parsed.DECODE_PROBE_TIMEOUT_MS,
    transcodeTimeoutMs: parsed.TRANSCODE_TIMEOUT_MS,
    scratchMaxAgeMs: parsed.SCRATCH_MAX_AGE_MS,
    defaultSampleRate: parsed.DEFAULT_SAMPLE_RATE,
  };
}
