// src/ledger-core/exclusions.ts
// Union of every disqualifying category into one set of identifiers.

import { EXCLUSION_CATEGORIES, ID_COLUMN } from '@shared/constants';
import type { ExclusionCategory } from '@shared/types';
import { resolveColumn } from './columns';
import { cellOf, type Dataset } from './dataset';
import { consoleLogger, type LedgerLogger } from './logger';
import type { LedgerRules } from './policy-pack';
import { parseIdentifier, textOf } from './values';

export interface ExclusionSources {
  roster: Dataset;
  interns: Dataset;
  apprentices: Dataset;
  leave: Dataset;
  overseas: Dataset;
}

export interface ExclusionSet {
  ids: Set<number>;
  /** Identifiers contributed by each category, before de-duplication. */
  byCategory: Record<ExclusionCategory, number>;
}

function identifiersOf(dataset: Dataset): number[] {
  if (!dataset.columns.includes(ID_COLUMN)) return [];

  const ids: number[] = [];
  for (const row of dataset.rows) {
    const id = parseIdentifier(cellOf(row, ID_COLUMN));
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

function directorsOf(roster: Dataset, rules: LedgerRules): number[] {
  const titleColumn = resolveColumn(roster, rules.columnPatterns.jobTitle);
  if (!titleColumn || !roster.columns.includes(ID_COLUMN)) return [];

  const term = rules.directorTitleTerm.toUpperCase();
  const ids: number[] = [];
  for (const row of roster.rows) {
    if (!textOf(cellOf(row, titleColumn)).toUpperCase().includes(term)) continue;
    const id = parseIdentifier(cellOf(row, ID_COLUMN));
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

/** Datasets are expected to have gone through `normalizeIdentifier`. */
export function buildExclusionSet(
  sources: ExclusionSources,
  rules: LedgerRules,
  logger: LedgerLogger = consoleLogger,
): ExclusionSet {
  const contributions: Record<ExclusionCategory, number[]> = {
    interns: identifiersOf(sources.interns),
    apprentices: identifiersOf(sources.apprentices),
    leave: identifiersOf(sources.leave),
    overseas: identifiersOf(sources.overseas),
    directors: directorsOf(sources.roster, rules),
  };

  const ids = new Set<number>();
  for (const category of EXCLUSION_CATEGORIES) {
    for (const id of contributions[category]) ids.add(id);
  }

  const byCategory: Record<ExclusionCategory, number> = {
    interns: contributions.interns.length,
    apprentices: contributions.apprentices.length,
    leave: contributions.leave.length,
    overseas: contributions.overseas.length,
    directors: contributions.directors.length,
  };

  logger.info('EXCLUSIONS', `Excluded identifiers: ${ids.size}`);
  return { ids, byCategory };
}
