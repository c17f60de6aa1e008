/**
 * Scratch Space Manager
 *
 * Hands out private temp directories for multi-step pipelines and removes
 * them when the pipeline settles, whether it succeeded or threw. Directories
 * left behind by a crashed process are swept by age at startup.
 */

import { mkdtemp, readdir, rm, stat } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, isErrnoException } from '@mediakit/utils';

const logger = createLogger({ component: 'scratch-space' });

export const SCRATCH_PREFIX = 'mediakit_';

export interface ScratchSpaceOptions {
  /** Parent directory; the OS temp dir by default */
  root?: string;
  prefix?: string;
}

export class ScratchSpaceManager {
  readonly root: string;
  readonly prefix: string;
  private readonly live = new Set<string>();
  private exitHookInstalled = false;

  constructor(options: ScratchSpaceOptions = {}) {
    this.root = options.root ?? tmpdir();
    this.prefix = options.prefix ?? SCRATCH_PREFIX;
  }

  /**
   * Directories currently in use by a running pipeline
   */
  get activeDirectories(): string[] {
    return [...this.live];
  }

  /**
   * Run `task` with a fresh directory that is removed afterwards
   */
  async withScratchDirectory<T>(task: (directory: string) => Promise<T>): Promise<T> {
    const directory = await mkdtemp(join(this.root, this.prefix));
    this.live.add(directory);
    logger.debug({ directory }, 'Scratch directory created');

    try {
      return await task(directory);
    } finally {
      this.live.delete(directory);
      await this.remove(directory);
    }
  }

  /**
   * Remove prefixed directories older than `maxAgeMs` that no pipeline is
   * using. Returns the removed paths.
   */
  async sweepOrphans(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    const removed: string[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory() || !entry.name.startsWith(this.prefix)) continue;

      const directory = join(this.root, entry.name);
      if (this.live.has(directory)) continue;

      try {
        const info = await stat(directory);
        if (now - info.mtimeMs <= maxAgeMs) continue;
        await rm(directory, { recursive: true, force: true });
        removed.push(directory);
      } catch (error) {
        // Another process may have removed it between readdir and stat
        if (isErrnoException(error) && error.code === 'ENOENT') continue;
        throw error;
      }
    }

    if (removed.length > 0) {
      logger.info({ count: removed.length, maxAgeMs }, 'Swept orphaned scratch directories');
    }
    return removed;
  }

  /**
   * Synchronously remove every live directory (process exit path)
   */
  releaseAll(): void {
    for (const directory of this.live) {
      rmSync(directory, { recursive: true, force: true });
    }
    this.live.clear();
  }

  /**
   * Remove live directories when the process exits
   */
  installExitHook(): void {
    if (this.exitHookInstalled) return;
    this.exitHookInstalled = true;
    process.once('exit', () => this.releaseAll());
  }

  private async remove(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
      logger.debug({ directory }, 'Scratch directory removed');
    } catch (error) {
      // Left for the next sweep
      logger.warn({ err: error, directory }, 'Failed to remove scratch directory');
    }
  }
}
