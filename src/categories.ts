/**
 * Evaluation order doubles as the tie-break when a path matches more than
 * one folder name: the first category in this list wins.
 */
export const CATEGORIES = ['external', 'internal', 'client'] as const;

export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}
