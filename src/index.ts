export { createPipeline, DocumentPipeline, type PipelineDependencies } from './indexer/index.js';
export type { FileOutcome, RunReport, RunCounts, SkipReason } from './indexer/outcome.js';
export { determineCategory } from './indexer/classifier.js';
export { scanDirectory, type ScannedFile, type ScanOptions } from './indexer/file-scanner.js';
export { ChangeTracker, type TrackedFileState } from './tracker/change-tracker.js';
export { AggregateStore, type SaveReport } from './aggregate/store.js';
export { parseDocument, serializeDocument, XmlParseError } from './aggregate/xml-codec.js';
export type { AggregateDocument, AggregateEntry, EntryMetadata, AddEntryResult } from './aggregate/schema.js';
export { createDocumentExtractor, DocumentExtractor, PdfExtractor, DocxExtractor, type TextExtractor } from './extractors/index.js';
export { loadConfig, parseConfig, resolveConfigPath, type AppConfig, type EntryKeyMode } from './config/index.js';
export { CATEGORIES, isCategory, type Category } from './categories.js';
export * from './errors.js';
export { Logger, logger, type LogLevel, type LogSink } from './utils/logger.js';
