import { mkdir, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import AdmZip from 'adm-zip';
import { x as extractTar } from 'tar';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AcquisitionError } from '../../utils/errors.js';
import { fetchWithTimeout, type FetchLike } from '../../utils/http.js';

export type ArchiveFormat = 'tar.gz' | 'zip';

export const archiveFileName = (url: string): string => {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.replace(/[?#].*$/, '');
  }
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch (error) {
    throw new AcquisitionError('DownloadFailed', `Malformed archive URL: ${url}`, error);
  }
  return basename(decoded) || 'archive';
};

export const detectArchiveFormat = (fileName: string): ArchiveFormat | undefined => {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) return 'tar.gz';
  if (lower.endsWith('.zip')) return 'zip';
  return undefined;
};

export interface ArchiveExtractorOptions {
  requestTimeoutMs?: number;
  fetchFn?: FetchLike;
}

export class ArchiveExtractor {
  private requestTimeoutMs: number;
  private fetchFn: FetchLike;

  constructor(options: ArchiveExtractorOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.pypi.requestTimeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Downloads the archive into `stagingDir` and unpacks it into
   * `<stagingDir>/extracted`, which is returned.
   */
  async downloadAndExtract(url: string, stagingDir: string): Promise<string> {
    const fileName = archiveFileName(url);
    const format = detectArchiveFormat(fileName);
    if (!format) {
      throw new AcquisitionError('UnsupportedFormat', `Unsupported archive format: ${fileName}`);
    }

    const content = await this.download(url);
    const archivePath = join(stagingDir, fileName);
    try {
      await writeFile(archivePath, content);
    } catch (error) {
      throw new AcquisitionError('DownloadFailed', `Could not save ${fileName}`, error);
    }

    const extractedDir = join(stagingDir, 'extracted');
    try {
      await mkdir(extractedDir, { recursive: true });
      if (format === 'tar.gz') {
        await extractTar({ file: archivePath, cwd: extractedDir });
      } else {
        new AdmZip(archivePath).extractAllTo(extractedDir, true);
      }
    } catch (error) {
      throw new AcquisitionError('ExtractionFailed', `Could not extract ${fileName}`, error);
    }

    logger.debug({ url, extractedDir, bytes: content.length }, 'Archive extracted');
    return extractedDir;
  }

  private async download(url: string): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.fetchFn, url, this.requestTimeoutMs);
    } catch (error) {
      throw new AcquisitionError('DownloadFailed', `Failed to download archive from ${url}`, error);
    }

    if (!response.ok) {
      throw new AcquisitionError(
        'DownloadFailed',
        `Failed to download archive from ${url} (HTTP ${response.status})`
      );
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new AcquisitionError('DownloadFailed', `Archive download from ${url} was interrupted`, error);
    }
  }
}
