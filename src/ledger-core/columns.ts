// src/ledger-core/columns.ts
// Best-effort column resolution over human-maintained headers.

import { columnAt, type Dataset } from './dataset';
import { foldText } from './values';

/**
 * Patterns are tried in order; for each, the first column whose folded name
 * contains it wins. Specific fragments go first in the pack.
 */
export function resolveColumn(dataset: Dataset, patterns: readonly string[]): string | undefined {
  const names = dataset.columns.map((column) => [column, foldText(column)] as const);
  for (const pattern of patterns) {
    const folded = foldText(pattern);
    const match = names.find(([, name]) => name.includes(folded));
    if (match) return match[0];
  }
  return undefined;
}

/** Like `resolveColumn`, falling back to the column at `position` (or the first one). */
export function resolveColumnOr(
  dataset: Dataset,
  patterns: readonly string[],
  position: number,
): string | undefined {
  return resolveColumn(dataset, patterns) ?? columnAt(dataset, position) ?? columnAt(dataset, 0);
}
