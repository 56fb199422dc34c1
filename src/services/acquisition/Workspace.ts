import { mkdtemp, rm } from 'fs/promises';
import { rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { logger } from '../../utils/logger.js';
import type { StagingArea } from './SourceAcquirer.interface.js';

/** Temporary directory shared by every package of one run. */
export class Workspace implements StagingArea {
  private disposed = false;

  private constructor(readonly path: string) {}

  static async create(prefix = 'assert-miner-'): Promise<Workspace> {
    const path = await mkdtemp(join(tmpdir(), prefix));
    logger.debug({ path }, 'Workspace created');
    return new Workspace(path);
  }

  /** Fresh, uniquely named directory inside the workspace. */
  async allocate(prefix: string): Promise<string> {
    return mkdtemp(join(this.path, prefix));
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await rm(this.path, { recursive: true, force: true });
    logger.debug({ path: this.path }, 'Workspace removed');
  }

  // For signal handlers, which cannot wait on a promise.
  disposeSync(): void {
    if (this.disposed) return;
    this.disposed = true;
    rmSync(this.path, { recursive: true, force: true });
  }
}
