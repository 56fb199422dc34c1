import type { PackageName, SourceLocation } from '../../domain/package.js';

export interface MetadataResolver {
  /** Linked source repository, or `none`. */
  resolve(packageName: PackageName): Promise<SourceLocation>;
  /** Source distribution of the current version, or `none`. */
  resolveArchive(packageName: PackageName): Promise<SourceLocation>;
}
