import fs from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';

import { FileNotFoundError } from '../metadata/errors';

export const DEFAULT_IMAGE_PATTERN = '*.{jpg,jpeg}';

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * @throws FileNotFoundError unless the path is a regular file
 */
export async function assertRegularFile(filePath: string): Promise<void> {
  if (!(await isRegularFile(filePath))) {
    throw new FileNotFoundError(filePath);
  }
}

/**
 * Expand CLI inputs into image paths. Files are kept as given and in order;
 * a directory contributes its regular files matching `pattern`, sorted by
 * name. Paths that do not exist are passed through so extraction reports them.
 */
export async function expandImagePaths(
  inputs: readonly string[],
  pattern: string = DEFAULT_IMAGE_PATTERN
): Promise<string[]> {
  const expanded: string[] = [];
  for (const input of inputs) {
    const absolute = path.resolve(input);
    const stats = await fs.stat(absolute).catch(() => undefined);
    if (!stats?.isDirectory()) {
      expanded.push(absolute);
      continue;
    }

    const entries = await fs.readdir(absolute, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => minimatch(name, pattern, { nocase: true, dot: false }))
      .sort((a, b) => a.localeCompare(b));
    expanded.push(...names.map((name) => path.join(absolute, name)));
  }
  return expanded;
}
