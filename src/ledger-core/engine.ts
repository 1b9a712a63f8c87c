// src/ledger-core/engine.ts
// One pass over a target period: normalize, exclude, consolidate, calculate.

import type { SourceKey } from '@shared/types';
import { ID_COLUMN } from '@shared/constants';
import { consolidateRecords, toBaseRecords } from './consolidator';
import { emptyDataset, isEmptyDataset, type Dataset } from './dataset';
import { calculateEntitlement, type Adjustment } from './entitlement';
import { LedgerPreconditionError } from './errors';
import { buildExclusionSet, type ExclusionSet } from './exclusions';
import { consoleLogger, type LedgerLogger } from './logger';
import { buildDaysByGroup, buildValueByRegion } from './lookups';
import { normalizeCategory, normalizeIdentifier } from './normalizer';
import type { LedgerRules } from './policy-pack';
import { periodStart, type CalendarDate, type TargetPeriod } from './values';

export type LedgerSources = Record<SourceKey, Dataset>;

export interface LedgerRow {
  id: number;
  admissionDate: CalendarDate | null;
  category: string;
  period: CalendarDate;
  days: number;
  dailyValue: number;
  total: number;
  employerCost: number;
  employeeDiscount: number;
  notes: string;
  adjustments: Adjustment[];
}

export interface LedgerResult {
  period: TargetPeriod;
  rows: LedgerRow[];
  exclusions: ExclusionSet;
  lookupSizes: { daysByGroup: number; valueByRegion: number };
}

export interface RunLedgerOptions {
  sources: Partial<LedgerSources>;
  period: TargetPeriod;
  rules: LedgerRules;
  logger?: LedgerLogger;
}

export function runLedger({
  sources,
  period,
  rules,
  logger = consoleLogger,
}: RunLedgerOptions): LedgerResult {
  const idPatterns = rules.columnPatterns.identifier;
  const load = (key: SourceKey) => normalizeIdentifier(sources[key] ?? emptyDataset(), idPatterns);

  const roster = normalizeCategory(load('roster'), rules.columnPatterns.category);

  if (isEmptyDataset(roster) || !roster.columns.includes(ID_COLUMN)) {
    throw new LedgerPreconditionError('Primary roster is empty or has no identifier column.');
  }

  const exclusions = buildExclusionSet(
    {
      roster,
      interns: load('interns'),
      apprentices: load('apprentices'),
      leave: load('leave'),
      overseas: load('overseas'),
    },
    rules,
    logger,
  );

  const base = toBaseRecords(roster, exclusions.ids, rules);
  logger.info('LEDGER', `Base after exclusions: ${base.length} records`);

  const records = consolidateRecords(
    base,
    { vacation: load('vacation'), termination: load('termination'), admission: load('admission') },
    rules,
  );

  const tables = {
    daysByGroup: buildDaysByGroup(sources.workingDays ?? emptyDataset(), rules, logger),
    valueByRegion: buildValueByRegion(sources.regionValues ?? emptyDataset(), rules, logger),
  };

  const competence = periodStart(period);
  const rows = records.map((record): LedgerRow => {
    const result = calculateEntitlement(record, period, tables, rules);
    return {
      id: record.id,
      admissionDate: record.admissionDate ?? null,
      category: record.category ?? '',
      period: competence,
      days: result.days,
      dailyValue: result.dailyValue,
      total: result.total,
      employerCost: result.employerCost,
      employeeDiscount: result.employeeDiscount,
      notes: result.notes,
      adjustments: result.adjustments,
    };
  });

  return {
    period,
    rows,
    exclusions,
    lookupSizes: {
      daysByGroup: tables.daysByGroup.size,
      valueByRegion: tables.valueByRegion.size,
    },
  };
}
