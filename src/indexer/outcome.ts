import type { Category } from '../categories.js';
import type { AddEntryResult } from '../aggregate/schema.js';
import type { SaveReport } from '../aggregate/store.js';
import type { PipelineError } from '../errors.js';

export type SkipReason =
  | 'excluded'
  | 'ignored-extension'
  | 'unsupported-extension'
  | 'up-to-date'
  | 'no-category';

export type FileOutcome =
  | { kind: 'processed'; path: string; category: Category; entryKey: string; entry: AddEntryResult }
  | { kind: 'skipped'; path: string; reason: SkipReason }
  | { kind: 'errored'; path: string; error: PipelineError };

export interface RunCounts {
  processed: number;
  skipped: number;
  errored: number;
}

export interface RunReport extends RunCounts {
  outcomes: FileOutcome[];
  save: SaveReport;
  durationMs: number;
}

export function countOutcomes(outcomes: readonly FileOutcome[]): RunCounts {
  const counts: RunCounts = { processed: 0, skipped: 0, errored: 0 };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'processed':
        counts.processed++;
        break;
      case 'skipped':
        counts.skipped++;
        break;
      case 'errored':
        counts.errored++;
        break;
    }
  }
  return counts;
}
