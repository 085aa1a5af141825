import { readdir, stat } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { createRequire } from 'node:module';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

const require = createRequire(import.meta.url);
const ignore = require('ignore') as () => {
  add(patterns: string | readonly string[]): void;
  ignores(pathname: string): boolean;
};

type Ignore = ReturnType<typeof ignore>;

export interface ScannedFile {
  path: string;
  /** Relative to the scan root, always with `/` separators. */
  relativePath: string;
  size: number;
  lastModified: Date;
  /** Matched one of the exclude patterns; still reported so it can be counted. */
  excluded: boolean;
}

export interface ScanOptions {
  /** gitignore-style patterns, relative to the root. */
  exclude?: readonly string[];
  logger?: Logger;
}

/**
 * Every regular file under rootPath, each exactly once, in a stable
 * (name-sorted, depth-first) order. Symlinks are not followed.
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions = {}
): Promise<ScannedFile[]> {
  const log = options.logger ?? rootLogger;
  const files: ScannedFile[] = [];

  let ig: Ignore | null = null;
  if (options.exclude && options.exclude.length > 0) {
    ig = ignore();
    ig.add(options.exclude);
  }

  await scanRecursive(rootPath, rootPath, files, ig, log);

  log.debug(`Scanned ${files.length} files in ${rootPath}`);
  return files;
}

async function scanRecursive(
  currentPath: string,
  rootPath: string,
  files: ScannedFile[],
  ig: Ignore | null,
  log: Logger
): Promise<void> {
  let entries;
  try {
    entries = await readdir(currentPath, { withFileTypes: true });
  } catch {
    log.warn(`Cannot read directory: ${currentPath}`);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(currentPath, entry.name);

    if (entry.isDirectory()) {
      await scanRecursive(fullPath, rootPath, files, ig, log);
    } else if (entry.isFile()) {
      const relativePath = relative(rootPath, fullPath).replace(/\\/g, '/');
      try {
        const stats = await stat(fullPath);
        files.push({
          path: fullPath,
          relativePath,
          size: stats.size,
          lastModified: stats.mtime,
          excluded: ig !== null && ig.ignores(relativePath),
        });
      } catch {
        log.warn(`Cannot stat file: ${fullPath}`);
      }
    }
  }
}
