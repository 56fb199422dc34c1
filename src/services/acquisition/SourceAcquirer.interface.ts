import type { SourceLocation } from '../../domain/package.js';

/** Absolute path of an unpacked source tree inside the run workspace. */
export type LocalSourceTree = string;

export interface StagingArea {
  /** Creates a fresh, uniquely named directory and returns its path. */
  allocate(prefix: string): Promise<string>;
}

export interface SourceAcquirer {
  acquire(location: SourceLocation, workspace: StagingArea): Promise<LocalSourceTree>;
}
