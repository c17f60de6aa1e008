/**
 * Binary Configuration
 * 
 * Centralized configuration for the external tools the engine drives.
 * Supports Windows, Linux and macOS binaries with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

/**
 * All supported binaries
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
  ytDlp: BinaryConfig;
}

/**
 * Resolve binary path with priority:
 * 1. Environment variable
 * 2. Custom binary folder
 * 3. Bare name, left to the system PATH
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }
  
  const customPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(customPath)) {
    return { name, envVar, resolvedPath: customPath, source: 'bundled' };
  }
  
  // Can't cheaply check PATH; a missing binary surfaces as an ExecutionError
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
    ytDlp: resolveBinaryPath('yt-dlp', 'YTDLP_PATH', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}
