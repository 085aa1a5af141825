import { mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CATEGORIES, isCategory, type Category } from '../categories.js';
import { InvalidCategoryError, PersistenceError, errorMessage, isNodeError } from '../errors.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  FILENAME_ATTRIBUTE,
  createEmptyDocument,
  entryFilename,
  type AddEntryResult,
  type AggregateDocument,
  type AggregateEntry,
  type EntryMetadata,
} from './schema.js';
import { isValidAttributeName, parseDocument, serializeDocument } from './xml-codec.js';

export interface AggregateStoreOptions {
  logger?: Logger;
}

export interface SaveReport {
  saved: Category[];
  failed: Array<{ category: Category; error: PersistenceError }>;
}

/** A document plus the set of filenames already in it. */
class CategoryDocument {
  private readonly keys = new Set<string>();

  constructor(readonly document: AggregateDocument) {
    for (const entry of document.entries) {
      const filename = entryFilename(entry);
      if (filename !== undefined) {
        this.keys.add(filename);
      }
    }
  }

  has(filename: string): boolean {
    return this.keys.has(filename);
  }

  append(entry: AggregateEntry, filename: string): void {
    this.document.entries.push(entry);
    this.keys.add(filename);
  }
}

/**
 * Owns the three per-category documents for the lifetime of a run.
 * Entries are appended in call order and never removed.
 */
export class AggregateStore {
  private readonly documents = new Map<Category, CategoryDocument>();
  private readonly log: Logger;

  constructor(
    private readonly outputFolder: string,
    private readonly outputFiles: Readonly<Record<Category, string>>,
    options: AggregateStoreOptions = {}
  ) {
    this.log = options.logger ?? rootLogger.child('store');
    for (const category of CATEGORIES) {
      this.documents.set(category, new CategoryDocument(createEmptyDocument()));
    }
  }

  async initialize(): Promise<void> {
    await mkdir(this.outputFolder, { recursive: true });
    this.log.info(`Output directory: ${this.outputFolder}`);
    await this.load();
  }

  /** Reads whatever documents exist without creating the output folder. */
  async load(): Promise<void> {
    for (const category of CATEGORIES) {
      const document = await this.loadExisting(category);
      this.documents.set(category, new CategoryDocument(document));
    }
  }

  addEntry(
    category: string,
    filename: string,
    text: string,
    metadata: EntryMetadata = {}
  ): AddEntryResult {
    if (!isCategory(category)) {
      this.log.error(`Invalid category: ${category}`);
      throw new InvalidCategoryError(category);
    }

    const target = this.getCategoryDocument(category);
    if (target.has(filename)) {
      this.log.debug(`Entry for ${filename} already exists in ${category}`);
      return 'duplicate';
    }

    const attributes: Record<string, string> = { [FILENAME_ATTRIBUTE]: filename };
    for (const [key, value] of Object.entries(metadata)) {
      if (key === FILENAME_ATTRIBUTE || !isValidAttributeName(key)) {
        this.log.warn(`Dropping metadata key "${key}" on ${filename}: not usable as an attribute`);
        continue;
      }
      attributes[key] = value instanceof Date ? value.toISOString() : String(value);
    }

    target.append({ attributes, text }, filename);
    this.log.info(`Added new entry for ${filename} to ${category}`);
    return 'added';
  }

  hasEntry(category: Category, filename: string): boolean {
    return this.getCategoryDocument(category).has(filename);
  }

  /** Live view of a category's document; callers must not mutate it. */
  getDocument(category: Category): Readonly<AggregateDocument> {
    return this.getCategoryDocument(category).document;
  }

  outputPath(category: Category): string {
    return join(this.outputFolder, this.outputFiles[category]);
  }

  async saveAll(): Promise<SaveReport> {
    this.log.info('Saving all XML files...');
    const report: SaveReport = { saved: [], failed: [] };

    for (const category of CATEGORIES) {
      const outputPath = this.outputPath(category);
      const { document } = this.getCategoryDocument(category);
      try {
        await writeFileAtomic(outputPath, serializeDocument(document));
        report.saved.push(category);
        this.log.info(`Saved ${this.outputFiles[category]} with ${document.entries.length} entries to ${outputPath}`);
      } catch (err) {
        const error = new PersistenceError(`Error saving ${outputPath}: ${errorMessage(err)}`, { cause: err });
        report.failed.push({ category, error });
        this.log.error(error.message);
      }
    }

    return report;
  }

  private getCategoryDocument(category: Category): CategoryDocument {
    const doc = this.documents.get(category);
    if (!doc) {
      throw new InvalidCategoryError(category);
    }
    return doc;
  }

  private async loadExisting(category: Category): Promise<AggregateDocument> {
    const filePath = this.outputPath(category);
    this.log.debug(`Checking for existing file: ${filePath}`);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        this.log.info(`No existing file found for ${category}, will create new ${this.outputFiles[category]}`);
      } else {
        this.log.warn(`Could not read existing ${filePath}, starting fresh: ${errorMessage(err)}`);
      }
      return createEmptyDocument();
    }

    try {
      const document = parseDocument(content);
      this.log.info(`Loaded existing ${this.outputFiles[category]} with ${document.entries.length} entries`);
      return document;
    } catch (err) {
      this.log.warn(`Could not parse existing ${this.outputFiles[category]}, starting fresh: ${errorMessage(err)}`);
      return createEmptyDocument();
    }
  }
}
