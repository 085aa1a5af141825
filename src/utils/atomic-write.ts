import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isNodeError } from '../errors.js';

/**
 * Write to a sibling temp file, then rename over the target so readers
 * see either the old content or the new content, never a partial file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, content, 'utf-8');

    // rename cannot replace an existing file on Windows
    if (process.platform === 'win32') {
      try {
        await unlink(filePath);
      } catch (err) {
        if (!isNodeError(err) || err.code !== 'ENOENT') throw err;
      }
    }

    await rename(tmp, filePath);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }
}
