import { CATEGORIES, type Category } from '../categories.js';

export function normalizeForMatch(path: string): string {
  return path.replace(/\\/g, '/').toLowerCase();
}

/**
 * First category whose folder name occurs anywhere in the directory path,
 * compared case-insensitively with `/` separators. Checked in CATEGORIES
 * order, so `external` beats `internal` beats `client`.
 */
export function determineCategory(
  directoryPath: string,
  folders: Readonly<Record<Category, string>>
): Category | null {
  const haystack = normalizeForMatch(directoryPath);
  for (const category of CATEGORIES) {
    if (haystack.includes(normalizeForMatch(folders[category]))) {
      return category;
    }
  }
  return null;
}
