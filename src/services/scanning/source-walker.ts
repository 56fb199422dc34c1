import { readdir } from 'fs/promises';
import { join } from 'path';

/**
 * Yields every regular file under `root` whose name ends with `suffix`.
 * Top-down: a directory's own files come before its subdirectories, and
 * entries are visited in name order. Symlinks are not followed.
 */
export async function* walkSourceFiles(root: string, suffix: string): AsyncGenerator<string> {
  const entries = await readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const subdirectories: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      subdirectories.push(join(root, entry.name));
    } else if (entry.isFile() && entry.name.endsWith(suffix)) {
      yield join(root, entry.name);
    }
  }

  for (const dir of subdirectories) {
    yield* walkSourceFiles(dir, suffix);
  }
}

export const countSourceFiles = async (root: string, suffix: string): Promise<number> => {
  let count = 0;
  for await (const _file of walkSourceFiles(root, suffix)) {
    count++;
  }
  return count;
};
