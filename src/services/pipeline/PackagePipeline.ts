import type { SemaphoreInterface } from 'async-mutex';
import { logger } from '../../utils/logger.js';
import { AcquisitionError, describeError, NoLocationFoundError } from '../../utils/errors.js';
import {
  createAssertionRecord,
  type PackageName,
  type PackageOutcome,
  type PipelineStage,
} from '../../domain/package.js';
import type { MetadataResolver } from '../metadata/MetadataResolver.interface.js';
import type { SourceAcquirer, StagingArea } from '../acquisition/SourceAcquirer.interface.js';
import type { SourceScanner } from '../scanning/SourceScanner.interface.js';
import type { ResultSink } from '../output/ResultSink.interface.js';
import type { ProgressSink, TaskId } from '../../reporters/ProgressSink.interface.js';

export interface PipelineContext {
  resolver: MetadataResolver;
  acquirer: SourceAcquirer;
  scanner: SourceScanner;
  sink: ResultSink;
  workspace: StagingArea;
  progress: ProgressSink;
  overallTask: TaskId;
  /** Held from resolution until the record is written. */
  permits: SemaphoreInterface;
}

const errorKind = (error: unknown): string => {
  if (error instanceof AcquisitionError) return error.kind;
  if (error instanceof Error) return error.name;
  return 'Unknown';
};

/**
 * resolve repository → (else) resolve sdist → acquire → scan → append record.
 * Any failure ends the package without a record; the overall progress task is
 * advanced exactly once per `run` whichever way it ends.
 */
export class PackagePipeline {
  constructor(private context: PipelineContext) {}

  async run(packageName: PackageName): Promise<PackageOutcome> {
    try {
      return await this.context.permits.runExclusive(() => this.process(packageName));
    } catch (error) {
      logger.error({ package: packageName, error }, 'Unexpected pipeline failure');
      return { package: packageName, status: 'failed', stage: 'resolving', reason: describeError(error) };
    } finally {
      this.context.progress.advance(this.context.overallTask);
    }
  }

  private async process(packageName: PackageName): Promise<PackageOutcome> {
    const { resolver, acquirer, scanner, sink, workspace, progress } = this.context;
    let stage: PipelineStage = 'resolving';
    let packageTask: TaskId | undefined;

    try {
      let location = await resolver.resolve(packageName);

      if (location.kind === 'none') {
        logger.info({ package: packageName }, 'No repository URL found, trying sdist');
        stage = 'resolving-archive';
        location = await resolver.resolveArchive(packageName);
        if (location.kind === 'none') {
          throw new NoLocationFoundError(`No repository or sdist found for ${packageName}`);
        }
      }

      stage = location.kind === 'repository' ? 'acquiring-repository' : 'acquiring-archive';
      const tree = await acquirer.acquire(location, workspace);

      stage = 'scanning';
      const fileCount = await scanner.countFiles(tree);
      const taskId = progress.addTask(`Processing ${packageName}`, fileCount);
      packageTask = taskId;
      const assertions = await scanner.scan(tree, () => progress.advance(taskId));
      progress.removeTask(taskId);
      packageTask = undefined;

      stage = 'writing';
      await sink.append(createAssertionRecord(packageName, assertions));
      logger.debug({ package: packageName, files: fileCount, assertions: assertions.length }, 'Package recorded');

      return { package: packageName, status: 'recorded', assertions: assertions.length };
    } catch (error) {
      const cause = describeError(error);
      if (error instanceof NoLocationFoundError) {
        logger.warn({ package: packageName, kind: 'NoLocationFound', cause }, 'Package skipped');
        return { package: packageName, status: 'no-location' };
      }

      logger.warn({ package: packageName, stage, kind: errorKind(error), cause }, 'Package failed');
      return { package: packageName, status: 'failed', stage, reason: cause };
    } finally {
      if (packageTask !== undefined) {
        progress.removeTask(packageTask);
      }
    }
  }
}
