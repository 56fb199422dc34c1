import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ResolutionError } from '../../utils/errors.js';
import { fetchWithTimeout, type FetchLike } from '../../utils/http.js';
import { projectMetadataSchema, type ProjectMetadata } from '../../schemas/pypi.schema.js';
import {
  archiveLocation,
  NO_LOCATION,
  repositoryLocation,
  type PackageName,
  type SourceLocation,
} from '../../domain/package.js';
import type { MetadataResolver } from './MetadataResolver.interface.js';
import { selectRepositoryUrl, selectSdistUrl } from './project-urls.js';

export interface PyPIMetadataResolverOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  fetchFn?: FetchLike;
}

export class PyPIMetadataResolver implements MetadataResolver {
  private baseUrl: string;
  private requestTimeoutMs: number;
  private fetchFn: FetchLike;

  constructor(options: PyPIMetadataResolverOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.pypi.baseUrl).replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.pypi.requestTimeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async resolve(packageName: PackageName): Promise<SourceLocation> {
    const metadata = await this.fetchMetadata(packageName);
    const url = metadata ? selectRepositoryUrl(metadata.info.project_urls) : undefined;
    return url ? repositoryLocation(url) : NO_LOCATION;
  }

  async resolveArchive(packageName: PackageName): Promise<SourceLocation> {
    const metadata = await this.fetchMetadata(packageName);
    const url = metadata ? selectSdistUrl(metadata) : undefined;
    return url ? archiveLocation(url) : NO_LOCATION;
  }

  metadataUrl(packageName: PackageName): string {
    return `${this.baseUrl}/pypi/${encodeURIComponent(packageName)}/json`;
  }

  /** `null` when the index answers with a non-success status. */
  private async fetchMetadata(packageName: PackageName): Promise<ProjectMetadata | null> {
    const url = this.metadataUrl(packageName);

    let response: Response;
    try {
      response = await fetchWithTimeout(this.fetchFn, url, this.requestTimeoutMs);
    } catch (error) {
      throw new ResolutionError(`Metadata request failed for ${packageName}`, error);
    }

    if (!response.ok) {
      logger.debug({ package: packageName, status: response.status }, 'Metadata unavailable');
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ResolutionError(`Metadata for ${packageName} is not valid JSON`, error);
    }

    const parsed = projectMetadataSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolutionError(`Unexpected metadata shape for ${packageName}`, parsed.error);
    }
    return parsed.data;
  }
}
