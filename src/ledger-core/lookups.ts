// src/ledger-core/lookups.ts
// Parameter tables built from loosely labelled reference sheets.

import { resolveColumnOr } from './columns';
import { cellOf, columnAt, type Dataset } from './dataset';
import { consoleLogger, type LedgerLogger } from './logger';
import type { LedgerRules } from './policy-pack';
import { parseAmount, parseInteger, textOf } from './values';

/** Group label → eligible working days. Insertion order drives matching. */
export type DaysByGroup = Map<string, number>;

/** Region label → daily benefit value. */
export type ValueByRegion = Map<string, number>;

export interface LookupTables {
  daysByGroup: DaysByGroup;
  valueByRegion: ValueByRegion;
}

export interface ResolvedRegion {
  key: string;
  fallbackValue: number;
}

// ── Builders ─────────────────────────────────────────────────────────────────

/**
 * Label in the first column, day count in the second. Header-like rows and
 * rows without an integer day count are skipped.
 */
export function buildDaysByGroup(
  dataset: Dataset,
  rules: LedgerRules,
  logger: LedgerLogger = consoleLogger,
): DaysByGroup {
  const table: DaysByGroup = new Map();
  const labelColumn = columnAt(dataset, 0);
  const daysColumn = columnAt(dataset, 1) ?? labelColumn;

  if (labelColumn && daysColumn) {
    const labelToken = rules.daysTableHeaderTokens.label.toUpperCase();
    const daysToken = rules.daysTableHeaderTokens.days.toUpperCase();

    for (const row of dataset.rows) {
      const label = textOf(cellOf(row, labelColumn)).trim();
      const rawDays = cellOf(row, daysColumn);

      if (!label || label.toUpperCase().includes(labelToken)) continue;
      if (textOf(rawDays).toUpperCase().includes(daysToken)) continue;

      const days = parseInteger(rawDays);
      if (days === undefined) continue;

      table.set(label, days);
    }
  }

  logger.info('LOOKUPS', `Working-day mappings: ${table.size}`);
  return table;
}

export function buildValueByRegion(
  dataset: Dataset,
  rules: LedgerRules,
  logger: LedgerLogger = consoleLogger,
): ValueByRegion {
  const table: ValueByRegion = new Map();
  const regionColumn = resolveColumnOr(dataset, rules.columnPatterns.region, 0);
  const valueColumn = resolveColumnOr(dataset, rules.columnPatterns.value, 1);

  if (regionColumn && valueColumn) {
    for (const row of dataset.rows) {
      const region = textOf(cellOf(row, regionColumn)).trim();
      if (!region) continue;

      const value = parseAmount(cellOf(row, valueColumn));
      if (value === undefined) continue;

      table.set(region, value);
    }
  }

  logger.info('LOOKUPS', `Region value mappings: ${table.size}`);
  return table;
}

// ── Lookups ──────────────────────────────────────────────────────────────────

/** Days for the first table key contained in the label, else the default. */
export function lookupEligibleDays(
  category: string | undefined,
  table: DaysByGroup,
  rules: LedgerRules,
): number {
  const label = category ?? '';
  for (const [key, days] of table) {
    if (label.includes(key)) return days;
  }
  return rules.defaultEligibleDays;
}

export function classifyRegion(category: string | undefined, rules: LedgerRules): ResolvedRegion {
  const label = (category ?? '').toUpperCase();
  const region = rules.regions.find((r) =>
    r.matchTerms.some((term) => label.includes(term.toUpperCase())),
  );
  return region ?? rules.defaultRegion;
}

export function lookupDailyValue(
  category: string | undefined,
  table: ValueByRegion,
  rules: LedgerRules,
): number {
  const region = classifyRegion(category, rules);
  return table.get(region.key) ?? region.fallbackValue;
}
