import { stat } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { AggregateStore } from '../aggregate/store.js';
import type { AppConfig } from '../config/index.js';
import { ConfigurationError, EmptyExtractionError, wrapError } from '../errors.js';
import { createDocumentExtractor, type TextExtractor } from '../extractors/index.js';
import { ChangeTracker } from '../tracker/change-tracker.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { determineCategory } from './classifier.js';
import { scanDirectory, type ScannedFile } from './file-scanner.js';
import { countOutcomes, type FileOutcome, type RunReport } from './outcome.js';

export interface PipelineDependencies {
  tracker: ChangeTracker;
  store: AggregateStore;
  extractor: TextExtractor;
  logger?: Logger;
  now?: () => Date;
}

type PipelineFile = Pick<ScannedFile, 'path' | 'relativePath' | 'excluded'>;

/**
 * One sequential pass over the root folder. Per-file failures become
 * `errored` outcomes; only a failure to walk the tree escapes a run.
 */
export class DocumentPipeline {
  private readonly tracker: ChangeTracker;
  private readonly store: AggregateStore;
  private readonly extractor: TextExtractor;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    deps: PipelineDependencies
  ) {
    this.tracker = deps.tracker;
    this.store = deps.store;
    this.extractor = deps.extractor;
    this.log = deps.logger ?? rootLogger.child('pipeline');
    this.now = deps.now ?? (() => new Date());
  }

  async processDirectory(): Promise<RunReport> {
    const startTime = Date.now();
    const rootPath = this.config.rootFolder;
    this.log.info(`Starting to process directory: ${rootPath}`);

    const files = await scanDirectory(rootPath, { exclude: this.config.exclude, logger: this.log });
    const outcomes: FileOutcome[] = [];

    for (let i = 0; i < files.length; i++) {
      this.log.progress(i + 1, files.length, files[i].relativePath);
      outcomes.push(await this.processFile(files[i]));
    }

    const save = await this.store.saveAll();
    const counts = countOutcomes(outcomes);

    this.log.info(
      `Processing complete. Processed: ${counts.processed}, Skipped: ${counts.skipped}, Errors: ${counts.errored}`
    );

    return { ...counts, outcomes, save, durationMs: Date.now() - startTime };
  }

  async processFile(file: PipelineFile): Promise<FileOutcome> {
    const filePath = file.path;

    if (file.excluded) {
      this.log.debug(`Skipped ${filePath}: matches an exclude pattern`);
      return { kind: 'skipped', path: filePath, reason: 'excluded' };
    }

    const extension = extname(filePath).toLowerCase();

    if (this.config.ignoreExtensions.has(extension)) {
      this.log.debug(`Skipped ${filePath}: ignored extension ${extension}`);
      return { kind: 'skipped', path: filePath, reason: 'ignored-extension' };
    }

    if (!this.config.documentExtensions.has(extension)) {
      this.log.debug(`Skipped ${filePath}: unsupported extension ${extension || '(none)'}`);
      return { kind: 'skipped', path: filePath, reason: 'unsupported-extension' };
    }

    try {
      if (!(await this.tracker.needsUpdate(filePath))) {
        this.log.debug(`Skipped ${filePath}: already processed`);
        return { kind: 'skipped', path: filePath, reason: 'up-to-date' };
      }

      const directory = join(this.config.configuredRootFolder, dirname(file.relativePath));
      const category = determineCategory(directory, this.config.folders);
      if (!category) {
        this.log.debug(`Skipped ${filePath}: no matching category for ${directory}`);
        return { kind: 'skipped', path: filePath, reason: 'no-category' };
      }
      this.log.debug(`Categorized ${filePath} as ${category}`);

      this.log.info(`Processing file: ${filePath}`);
      const text = await this.extractor.extract(filePath);
      if (!text.trim()) {
        throw new EmptyExtractionError(filePath);
      }

      const entryKey = this.entryKeyFor(file);
      const entry = this.store.addEntry(category, entryKey, text, {
        processed_date: this.now().toISOString(),
      });
      if (entry === 'duplicate') {
        this.log.warn(`${category} already has an entry for ${entryKey}; ${filePath} was not added`);
      }

      await this.tracker.markProcessed(filePath);
      return { kind: 'processed', path: filePath, category, entryKey, entry };
    } catch (err) {
      const error = wrapError(err);
      if (error.code === 'EMPTY_EXTRACTION') {
        this.log.warn(error.message);
      } else {
        this.log.error(`Error processing ${filePath}: ${error.message}`);
      }
      return { kind: 'errored', path: filePath, error };
    }
  }

  private entryKeyFor(file: PipelineFile): string {
    return this.config.entryKey === 'relative-path' ? file.relativePath : basename(file.path);
  }
}

/**
 * Loads tracker state and prior output documents. Throws ConfigurationError
 * when the root folder is missing and PersistenceError when the tracker
 * file is unreadable or corrupt.
 */
export async function createPipeline(
  config: AppConfig,
  options: { logger?: Logger; extractor?: TextExtractor } = {}
): Promise<DocumentPipeline> {
  const log = options.logger ?? rootLogger;

  const rootStats = await stat(config.rootFolder).catch(() => null);
  if (!rootStats?.isDirectory()) {
    throw new ConfigurationError(`Root folder does not exist or is not a directory: ${config.rootFolder}`);
  }

  const tracker = new ChangeTracker(config.trackerFile, { logger: log.child('tracker') });
  await tracker.load();

  const store = new AggregateStore(config.outputFolder, config.outputFiles, { logger: log.child('store') });
  await store.initialize();

  const extractor = options.extractor ?? createDocumentExtractor(log);
  const pipeline = new DocumentPipeline(config, {
    tracker,
    store,
    extractor,
    logger: log.child('pipeline'),
  });
  log.info('Pipeline initialized successfully');
  return pipeline;
}

export { AggregateStore, ChangeTracker };
export type { FileOutcome, RunReport, RunCounts, SkipReason } from './outcome.js';
