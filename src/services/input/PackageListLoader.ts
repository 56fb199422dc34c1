import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { logger } from '../../utils/logger.js';
import { InputError } from '../../utils/errors.js';
import { packageListSchema } from '../../schemas/package-list.schema.js';
import type { PackageName } from '../../domain/package.js';

const formatIssues = (error: ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/** Package names in input order, first occurrence of each name kept. */
export const parsePackageList = (raw: unknown): PackageName[] => {
  const parsed = packageListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Invalid package list: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return [...new Set(parsed.data)];
};

export const loadPackageList = async (path: string): Promise<PackageName[]> => {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read package list ${path}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InputError(`Package list ${path} is not valid JSON`, error);
  }

  const names = parsePackageList(raw);
  logger.info({ path, packages: names.length }, 'Package list loaded');
  return names;
};
