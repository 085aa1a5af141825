export const DEFAULT_ROOT_NAME = 'Root';
export const ENTRY_ELEMENT = 'entry';
export const FILENAME_ATTRIBUTE = 'filename';

/**
 * One aggregated document. Attributes keep insertion order; `filename`
 * comes first on entries this program writes, but entries loaded from an
 * existing file are kept as found.
 */
export interface AggregateEntry {
  attributes: Record<string, string>;
  text: string;
}

export interface AggregateDocument {
  rootName: string;
  entries: AggregateEntry[];
}

export type EntryMetadata = Record<string, string | number | boolean | Date>;

export type AddEntryResult = 'added' | 'duplicate';

export function entryFilename(entry: AggregateEntry): string | undefined {
  return entry.attributes[FILENAME_ATTRIBUTE];
}

export function createEmptyDocument(rootName: string = DEFAULT_ROOT_NAME): AggregateDocument {
  return { rootName, entries: [] };
}
