import { Semaphore } from 'async-mutex';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { PackageOutcome } from '../../domain/package.js';
import { loadPackageList } from '../input/PackageListLoader.js';
import type { MetadataResolver } from '../metadata/MetadataResolver.interface.js';
import { PyPIMetadataResolver } from '../metadata/PyPIMetadataResolver.js';
import type { SourceAcquirer } from '../acquisition/SourceAcquirer.interface.js';
import { DefaultSourceAcquirer } from '../acquisition/SourceAcquirer.js';
import { Workspace } from '../acquisition/Workspace.js';
import type { SourceScanner } from '../scanning/SourceScanner.interface.js';
import { AssertionScanner } from '../scanning/AssertionScanner.js';
import type { ResultSink } from '../output/ResultSink.interface.js';
import { JsonlResultSink } from '../output/JsonlResultSink.js';
import type { ProgressSink } from '../../reporters/ProgressSink.interface.js';
import { ProgressReporter } from '../../reporters/ProgressReporter.js';
import { PackagePipeline } from './PackagePipeline.js';

export interface RunOptions {
  packageListPath: string;
  resultsPath: string;
  maxConcurrent: number;
  /** Remove the workspace and exit on SIGINT/SIGTERM. */
  handleSignals?: boolean;
}

export interface CoordinatorDependencies {
  resolver?: MetadataResolver;
  acquirer?: SourceAcquirer;
  scanner?: SourceScanner;
  progress?: ProgressSink;
  openSink?: (path: string) => Promise<ResultSink>;
  createWorkspace?: () => Promise<Workspace>;
}

export interface RunSummary {
  total: number;
  recorded: number;
  noLocation: number;
  failed: number;
  assertions: number;
  resultsPath: string;
}

export const defaultRunOptions = (): RunOptions => ({
  packageListPath: config.input.packageListPath,
  resultsPath: config.output.resultsPath,
  maxConcurrent: config.pipeline.maxConcurrent,
});

const summarize = (outcomes: PackageOutcome[], resultsPath: string): RunSummary => {
  const summary: RunSummary = {
    total: outcomes.length,
    recorded: 0,
    noLocation: 0,
    failed: 0,
    assertions: 0,
    resultsPath,
  };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'recorded':
        summary.recorded++;
        summary.assertions += outcome.assertions;
        break;
      case 'no-location':
        summary.noLocation++;
        break;
      case 'failed':
        summary.failed++;
        break;
    }
  }
  return summary;
};

export class Coordinator {
  constructor(private deps: CoordinatorDependencies = {}) {}

  /**
   * One pipeline per package under a shared permit pool. Setup failures
   * (package list, workspace, results file) reject; per-package failures never do.
   */
  async run(options: RunOptions): Promise<RunSummary> {
    const packages = await loadPackageList(options.packageListPath);

    const workspace = await (this.deps.createWorkspace ?? (() => Workspace.create()))();
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.warn({ signal }, 'Interrupted, removing workspace');
      workspace.disposeSync();
      process.exit(signal === 'SIGINT' ? 130 : 143);
    };
    if (options.handleSignals) {
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);
    }

    const progress = this.deps.progress ?? new ProgressReporter(false);
    const overallTask = progress.addTask('Processing packages', packages.length);

    try {
      const sink = await (this.deps.openSink ?? JsonlResultSink.open)(options.resultsPath);
      try {
        logger.info(
          { packages: packages.length, maxConcurrent: options.maxConcurrent, workspace: workspace.path },
          'Starting run'
        );

        const pipeline = new PackagePipeline({
          resolver: this.deps.resolver ?? new PyPIMetadataResolver(),
          acquirer: this.deps.acquirer ?? new DefaultSourceAcquirer(),
          scanner: this.deps.scanner ?? new AssertionScanner(),
          sink,
          workspace,
          progress,
          overallTask,
          permits: new Semaphore(options.maxConcurrent),
        });

        const outcomes = await Promise.all(packages.map(name => pipeline.run(name)));
        const summary = summarize(outcomes, options.resultsPath);
        logger.info(summary, 'Run complete');
        return summary;
      } finally {
        await sink.close();
      }
    } finally {
      progress.removeTask(overallTask);
      if (options.handleSignals) {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
      await workspace.dispose();
    }
  }
}
