// src/ledger-core/normalizer.ts
// Canonical identifier/category columns so every source joins on the same key.

import { CATEGORY_COLUMN, ID_COLUMN } from '@shared/constants';
import { resolveColumn } from './columns';
import { mapColumn, renameColumn, type Dataset } from './dataset';
import type { LedgerRules } from './policy-pack';
import { parseIdentifier } from './values';

function canonicalize(dataset: Dataset, canonical: string, patterns: readonly string[]): Dataset {
  if (dataset.columns.includes(canonical)) return dataset;

  const match = resolveColumn(dataset, patterns);
  return match ? renameColumn(dataset, match, canonical) : dataset;
}

/**
 * Renames the identifier column to `MATRICULA` and coerces it to integers,
 * leaving `null` where the value cannot be read. No-op without a match.
 */
export function normalizeIdentifier(
  dataset: Dataset,
  patterns: LedgerRules['columnPatterns']['identifier'],
): Dataset {
  const renamed = canonicalize(dataset, ID_COLUMN, patterns);
  return mapColumn(renamed, ID_COLUMN, (value) => parseIdentifier(value) ?? null);
}

export function normalizeCategory(
  dataset: Dataset,
  patterns: LedgerRules['columnPatterns']['category'],
): Dataset {
  return canonicalize(dataset, CATEGORY_COLUMN, patterns);
}
