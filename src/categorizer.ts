import { AppError } from './logger.js';
import type { CategoryGroups } from './config.js';
import { CategoryTable } from './types.js';

export const FALLBACK_CATEGORY = 'Other';

/**
 * Lowercase an extension and give it a leading dot ("JPG" → ".jpg").
 * The empty extension stays empty.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * A name usable as one directory level below the output folder
 */
export function isFolderName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed !== '.' && trimmed !== '..' && !/[\\/]/.test(name);
}

export function buildCategoryTable(
  groups: CategoryGroups,
  fallback: string = FALLBACK_CATEGORY
): CategoryTable {
  const extensions = new Map<string, string>();

  for (const [category, members] of Object.entries(groups)) {
    if (!isFolderName(category)) {
      throw new AppError(`Invalid category name: "${category}"`, 'CONFIG_INVALID', { category });
    }
    for (const member of members) {
      const extension = normalizeExtension(member);
      if (!extension) continue;

      const owner = extensions.get(extension);
      if (owner && owner !== category) {
        throw new AppError(
          `Extension ${extension} is mapped to both ${owner} and ${category}`,
          'CONFIG_INVALID',
          { extension, categories: [owner, category] }
        );
      }
      extensions.set(extension, category);
    }
  }

  const categories = Object.keys(groups).filter(category => category !== fallback);

  return {
    extensions,
    categories: Object.freeze([...categories, fallback]),
    fallback
  };
}

export function categorize(extension: string, table: CategoryTable): string {
  return table.extensions.get(normalizeExtension(extension)) ?? table.fallback;
}
