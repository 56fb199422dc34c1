#!/usr/bin/env node
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { Coordinator, defaultRunOptions, type RunOptions, type RunSummary } from './services/pipeline/Coordinator.js';

interface CliArgs {
  input?: string;
  output?: string;
  concurrency?: number;
  help?: boolean;
}

const HELP = `
assert-miner - Collect assert statements from the sources of PyPI packages

Usage:
  assert-miner [options]

Options:
  --input <path>       Package list JSON (default: ${config.input.packageListPath})
  --output <path>      Results file, one JSON object per line (default: ${config.output.resultsPath})
  --concurrency <n>    Max packages processed at once (default: ${config.pipeline.maxConcurrent})
  --help               Show this help message

Examples:
  assert-miner
  assert-miner --input ./packages.json --output ./asserts.jsonl
  assert-miner --concurrency 20
`;

const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--output':
        args.output = argv[++i];
        break;
      case '--concurrency':
        args.concurrency = parseInt(argv[++i] ?? '', 10);
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

const printSummary = (summary: RunSummary): void => {
  console.log('\nSummary:');
  console.log(`  Packages:    ${summary.total}`);
  console.log(`  Recorded:    ${summary.recorded}`);
  console.log(`  No source:   ${summary.noLocation}`);
  console.log(`  Failed:      ${summary.failed}`);
  console.log(`  Assertions:  ${summary.assertions}`);
  console.log(`  Results:     ${summary.resultsPath}`);
};

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (args.concurrency !== undefined && !(Number.isInteger(args.concurrency) && args.concurrency > 0)) {
    console.error('Error: --concurrency must be a positive integer');
    process.exit(1);
  }

  const options: RunOptions = {
    ...defaultRunOptions(),
    ...(args.input ? { packageListPath: args.input } : {}),
    ...(args.output ? { resultsPath: args.output } : {}),
    ...(args.concurrency ? { maxConcurrent: args.concurrency } : {}),
    handleSignals: true,
  };

  const progress = new ProgressReporter(process.stdout.isTTY);
  const coordinator = new Coordinator({ progress });

  try {
    const summary = await coordinator.run(options);
    progress.complete(`Processed ${summary.total} packages`);
    printSummary(summary);
  } catch (error) {
    progress.stop();
    logger.fatal({ error }, 'Run aborted');
    console.error('Error:', describeError(error));
    process.exit(1);
  }
};

await main();
