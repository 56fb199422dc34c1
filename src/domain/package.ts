export type PackageName = string;

export type SourceLocation =
  | { kind: 'repository'; url: string }
  | { kind: 'archive'; url: string }
  | { kind: 'none' };

export const repositoryLocation = (url: string): SourceLocation => ({ kind: 'repository', url });
export const archiveLocation = (url: string): SourceLocation => ({ kind: 'archive', url });
export const NO_LOCATION: SourceLocation = Object.freeze({ kind: 'none' });

export interface AssertionRecord {
  readonly package: PackageName;
  readonly assertions: readonly string[];
}

export const createAssertionRecord = (pkg: PackageName, assertions: readonly string[]): AssertionRecord =>
  Object.freeze({ package: pkg, assertions: Object.freeze([...assertions]) });

export type PackageOutcome =
  | { package: PackageName; status: 'recorded'; assertions: number }
  | { package: PackageName; status: 'no-location' }
  | { package: PackageName; status: 'failed'; stage: PipelineStage; reason: string };

export type PipelineStage =
  | 'resolving'
  | 'resolving-archive'
  | 'acquiring-repository'
  | 'acquiring-archive'
  | 'scanning'
  | 'writing';
