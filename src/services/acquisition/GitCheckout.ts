import { spawn } from 'child_process';
import { join } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AcquisitionError } from '../../utils/errors.js';

const MAX_STDERR_CHARS = 2000;

/** Final path segment of a repository URL, e.g. `requests` for `https://github.com/psf/requests/`. */
export const repositoryDirName = (url: string): string => {
  const segments = url.replace(/[?#].*$/, '').split('/').filter(segment => segment.length > 0);
  const last = segments[segments.length - 1] ?? '';
  return last.replace(/[^a-zA-Z0-9._-]/g, '_') || 'repository';
};

export interface GitCheckoutOptions {
  timeoutMs?: number;
  gitBinary?: string;
}

export class GitCheckout {
  private timeoutMs: number;
  private gitBinary: string;

  constructor(options: GitCheckoutOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.checkout.timeoutMs;
    this.gitBinary = options.gitBinary ?? 'git';
  }

  /** Shallow clone of `url` into `<parentDir>/<last segment>`. */
  async clone(url: string, parentDir: string): Promise<string> {
    const targetDir = join(parentDir, repositoryDirName(url));
    logger.debug({ url, targetDir }, 'Cloning repository');

    await new Promise<void>((resolve, reject) => {
      const proc = spawn(this.gitBinary, ['clone', '--depth', '1', url, targetDir], {
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        stdio: ['ignore', 'ignore', 'pipe'],
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
      });

      let stderr = '';
      proc.stderr.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_CHARS) {
          stderr += data.toString();
        }
      });

      proc.on('error', (err) => {
        reject(new AcquisitionError('CheckoutFailed', `Could not start ${this.gitBinary}`, err));
      });

      proc.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = signal ? `killed by ${signal}` : `exit code ${code}`;
        reject(
          new AcquisitionError(
            'CheckoutFailed',
            `git clone of ${url} failed (${reason})`,
            { stderr: stderr.trim().slice(0, MAX_STDERR_CHARS) }
          )
        );
      });
    });

    return targetDir;
  }
}
