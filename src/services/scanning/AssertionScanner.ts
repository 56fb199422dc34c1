import { readFile } from 'fs/promises';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ParseError } from '../../utils/errors.js';
import type { SourceScanner } from './SourceScanner.interface.js';
import { PythonAssertionParser } from './PythonAssertionParser.js';
import { countSourceFiles, walkSourceFiles } from './source-walker.js';

export class AssertionScanner implements SourceScanner {
  constructor(
    private parser: PythonAssertionParser = new PythonAssertionParser(),
    private sourceSuffix: string = config.scan.sourceSuffix
  ) {}

  countFiles(directory: string): Promise<number> {
    return countSourceFiles(directory, this.sourceSuffix);
  }

  async scan(directory: string, onFileScanned: () => void = () => {}): Promise<string[]> {
    const assertions: string[] = [];

    for await (const file of walkSourceFiles(directory, this.sourceSuffix)) {
      const source = await readFile(file, 'utf-8');
      try {
        assertions.push(...this.parser.extract(source, file));
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        logger.warn({ file, line: error.line, column: error.column }, 'Syntax error, skipping file');
      }

      onFileScanned();
      await yieldToEventLoop();
    }

    return assertions;
  }
}
