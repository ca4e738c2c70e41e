/**
 * StemLock - Advisory lock on a stem's working directory.
 *
 * Two runs over the same stem would race on the state record and on the
 * clip folders. The lock is a `.lock` file created exclusively, holding the
 * owner's pid. A lock whose owner is no longer running is replaced.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { LockedError } from '../errors';
import type { Logger } from '../logging/Logger';

export const LOCK_FILENAME = '.lock';

const lockContentsSchema = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string(),
});

type LockContents = z.infer<typeof lockContentsSchema>;

export type ProcessAliveCheck = (pid: number) => boolean;

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means it exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export class StemLock {
  private readonly lockPath: string;
  private held = false;

  constructor(
    workDir: string,
    private readonly logger: Logger,
    private readonly isAlive: ProcessAliveCheck = isProcessAlive,
    private readonly pid: number = process.pid,
  ) {
    this.lockPath = path.join(workDir, LOCK_FILENAME);
  }

  getLockPath(): string {
    return this.lockPath;
  }

  /**
   * @throws LockedError when another live process holds the lock
   */
  async acquire(): Promise<void> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    const contents: LockContents = { pid: this.pid, acquiredAt: new Date().toISOString() };

    for (let tries = 0; tries < 2; tries++) {
      try {
        await fs.writeFile(this.lockPath, JSON.stringify(contents) + '\n', { flag: 'wx' });
        this.held = true;
        return;
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw error;
        }
      }

      const owner = await this.readOwner();
      if (owner && owner.pid !== this.pid && this.isAlive(owner.pid)) {
        throw new LockedError(
          `Another run (pid ${owner.pid}, since ${owner.acquiredAt}) is working on this input`,
          this.lockPath,
        );
      }
      this.logger.warn(
        `Removing stale lock${owner ? ` left by pid ${owner.pid}` : ''}: ${this.lockPath}`,
      );
      await fs.rm(this.lockPath, { force: true });
    }

    throw new LockedError('Could not acquire lock', this.lockPath);
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await fs.rm(this.lockPath, { force: true });
  }

  private async readOwner(): Promise<LockContents | null> {
    try {
      const raw = await fs.readFile(this.lockPath, 'utf-8');
      const parsed = lockContentsSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      // unreadable or half-written lock is treated as stale
      return null;
    }
  }
}
