import { open, type FileHandle } from 'fs/promises';
import { Mutex } from 'async-mutex';
import { logger } from '../../utils/logger.js';
import type { AssertionRecord } from '../../domain/package.js';
import type { ResultSink } from './ResultSink.interface.js';

/**
 * `{"<package>": ["<assertion>", ...]}` with a space after every `:` and `,`
 * separator, matching the layout existing consumers of results files read.
 */
export const formatRecordLine = (record: AssertionRecord): string => {
  const assertions = record.assertions.map(text => JSON.stringify(text)).join(', ');
  return `{${JSON.stringify(record.package)}: [${assertions}]}\n`;
};

export class JsonlResultSink implements ResultSink {
  private writeLock = new Mutex();
  private closed = false;

  private constructor(private handle: FileHandle, readonly path: string) {}

  /** Opens `path` for writing, truncating whatever was there. */
  static async open(path: string): Promise<JsonlResultSink> {
    const handle = await open(path, 'w');
    logger.debug({ path }, 'Results file opened');
    return new JsonlResultSink(handle, path);
  }

  async append(record: AssertionRecord): Promise<void> {
    const line = formatRecordLine(record);
    await this.writeLock.runExclusive(async () => {
      if (this.closed) {
        throw new Error(`Results file ${this.path} is already closed`);
      }
      // Unbuffered: the line reaches the OS before the lock is released.
      await this.handle.write(line);
    });
  }

  async close(): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      if (this.closed) return;
      this.closed = true;
      await this.handle.close();
    });
  }
}
