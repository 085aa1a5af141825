import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { PersistenceError, errorMessage, isNodeError } from '../errors.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

const TrackedFileStateSchema = z.record(z.string(), z.number());

/** Absolute path -> mtime (seconds since epoch, fractional) at last successful processing. */
export type TrackedFileState = Record<string, number>;

export interface ChangeTrackerOptions {
  logger?: Logger;
}

/**
 * Remembers when each file was last processed. Every mutation rewrites the
 * whole tracker file before returning, so progress survives a crash mid-run.
 */
export class ChangeTracker {
  private state: Map<string, number> = new Map();
  private loaded = false;
  private readonly log: Logger;

  constructor(
    private readonly trackerFile: string,
    options: ChangeTrackerOptions = {}
  ) {
    this.log = options.logger ?? rootLogger.child('tracker');
  }

  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.trackerFile, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        this.log.info(`No tracker file at ${this.trackerFile}, starting fresh`);
        this.state = new Map();
        this.loaded = true;
        return;
      }
      throw new PersistenceError(`Cannot read tracker file ${this.trackerFile}: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new PersistenceError(`Tracker file ${this.trackerFile} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const result = TrackedFileStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Tracker file ${this.trackerFile} must map file paths to numeric timestamps`);
    }

    this.state = new Map(Object.entries(result.data));
    this.loaded = true;
    this.log.info(`Loaded ${this.state.size} entries from tracker file`);
  }

  async needsUpdate(filePath: string): Promise<boolean> {
    const key = normalizeTrackedPath(filePath);
    const current = await readMtime(key);
    if (current === null) {
      return false;
    }

    const lastProcessed = this.state.get(key) ?? 0;
    this.log.debug(`${key}: mtime ${current}, last processed ${lastProcessed}`);
    return current > lastProcessed;
  }

  async markProcessed(filePath: string): Promise<void> {
    const key = normalizeTrackedPath(filePath);
    const current = await readMtime(key);
    if (current === null) {
      throw new PersistenceError(`Cannot record ${key}: file no longer exists`);
    }

    this.state.set(key, current);
    await this.persist();
  }

  async forget(filePath: string): Promise<boolean> {
    const key = normalizeTrackedPath(filePath);
    if (!this.state.delete(key)) {
      return false;
    }
    await this.persist();
    return true;
  }

  lastProcessed(filePath: string): number | undefined {
    return this.state.get(normalizeTrackedPath(filePath));
  }

  get size(): number {
    return this.state.size;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  snapshot(): TrackedFileState {
    return Object.fromEntries(this.state);
  }

  private async persist(): Promise<void> {
    const content = JSON.stringify(this.snapshot(), null, 2);
    try {
      await writeFileAtomic(this.trackerFile, content);
    } catch (err) {
      throw new PersistenceError(`Failed to write tracker file ${this.trackerFile}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export function normalizeTrackedPath(filePath: string): string {
  return resolve(filePath);
}

/** Null when the file is missing or cannot be stat'ed; such files are never due. */
async function readMtime(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.mtimeMs / 1000 : null;
  } catch {
    return null;
  }
}
