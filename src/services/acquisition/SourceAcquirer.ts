import { logger } from '../../utils/logger.js';
import type { SourceLocation } from '../../domain/package.js';
import type { LocalSourceTree, SourceAcquirer, StagingArea } from './SourceAcquirer.interface.js';
import { GitCheckout } from './GitCheckout.js';
import { ArchiveExtractor } from './ArchiveExtractor.js';

/**
 * Turns a resolved location into an unpacked tree. Every acquisition gets its
 * own staging directory, so packages never share a checkout or extraction.
 */
export class DefaultSourceAcquirer implements SourceAcquirer {
  constructor(
    private checkout: GitCheckout = new GitCheckout(),
    private extractor: ArchiveExtractor = new ArchiveExtractor()
  ) {}

  async acquire(location: SourceLocation, workspace: StagingArea): Promise<LocalSourceTree> {
    switch (location.kind) {
      case 'repository': {
        const stagingDir = await workspace.allocate('repo-');
        return this.checkout.clone(location.url, stagingDir);
      }
      case 'archive': {
        const stagingDir = await workspace.allocate('sdist-');
        return this.extractor.downloadAndExtract(location.url, stagingDir);
      }
      case 'none':
        logger.error('Acquisition requested without a source location');
        throw new Error('Cannot acquire sources without a location');
    }
  }
}
