import type { ProjectMetadata } from '../../schemas/pypi.schema.js';

type ProjectUrls = Record<string, string | null>;

const GITHUB_REPO_PATTERN = /^(https?:\/\/github\.com\/[^/]+\/[^/]+)/;

const REPOSITORY_KEYS = [
  'Source',
  'Code',
  'Repository',
  'GitHub: repo',
  'Source Code',
  'Homepage',
  'GitHub',
] as const;

const ISSUE_TRACKER_KEYS = ['Issues', 'Bug Tracker', 'Bug Reports'] as const;

const lookup = (urls: ProjectUrls, key: string): string | undefined => {
  const exact = urls[key];
  if (exact) return exact;

  const wanted = key.toLowerCase();
  for (const [label, value] of Object.entries(urls)) {
    if (value && label.toLowerCase() === wanted) return value;
  }
  return undefined;
};

export const selectRepositoryUrl = (urls: ProjectUrls | null | undefined): string | undefined => {
  if (!urls) return undefined;

  for (const value of Object.values(urls)) {
    const match = value ? GITHUB_REPO_PATTERN.exec(value) : null;
    if (match) return match[1];
  }

  for (const key of REPOSITORY_KEYS) {
    const url = lookup(urls, key);
    if (url && url.includes('github.com')) return url;
  }

  for (const key of ISSUE_TRACKER_KEYS) {
    const url = lookup(urls, key);
    if (url && url.includes('github.com')) return url.replace(/\/issues\/?$/, '');
  }

  return undefined;
};

export const selectSdistUrl = (metadata: ProjectMetadata): string | undefined => {
  const files = metadata.releases[metadata.info.version] ?? [];
  return files.find(file => file.packagetype === 'sdist')?.url;
};
