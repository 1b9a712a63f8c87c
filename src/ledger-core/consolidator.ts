// src/ledger-core/consolidator.ts
// Left-joins the filtered roster with the life-cycle sources on MATRICULA.

import { CATEGORY_COLUMN, ID_COLUMN } from '@shared/constants';
import { resolveColumn } from './columns';
import { cellOf, type DataRow, type Dataset } from './dataset';
import type { LedgerRules } from './policy-pack';
import {
  parseCalendarDate,
  parseIdentifier,
  parseInteger,
  parseText,
  type CalendarDate,
} from './values';

export interface BaseRecord {
  id: number;
  category?: string;
  jobTitle?: string;
  admissionDate?: CalendarDate;
}

export interface EnrichedRecord extends BaseRecord {
  vacationDays?: number;
  terminationDate?: CalendarDate;
  noticeStatus?: string;
}

export interface LifecycleSources {
  vacation: Dataset;
  termination: Dataset;
  admission: Dataset;
}

/** Roster rows with a readable identifier that are not excluded, in roster order. */
export function toBaseRecords(
  roster: Dataset,
  excluded: ReadonlySet<number>,
  rules: LedgerRules,
): BaseRecord[] {
  const titleColumn = resolveColumn(roster, rules.columnPatterns.jobTitle);
  const admissionColumn = resolveColumn(roster, rules.columnPatterns.admissionDate);
  const records: BaseRecord[] = [];

  for (const row of roster.rows) {
    const id = parseIdentifier(cellOf(row, ID_COLUMN));
    if (id === undefined || excluded.has(id)) continue;

    records.push({
      id,
      category: parseText(cellOf(row, CATEGORY_COLUMN)),
      jobTitle: titleColumn ? parseText(cellOf(row, titleColumn)) : undefined,
      admissionDate: admissionColumn ? parseCalendarDate(cellOf(row, admissionColumn)) : undefined,
    });
  }

  return records;
}

/** First row per identifier; empty when the dataset lacks any required column. */
function indexById(dataset: Dataset, required: (string | undefined)[]): Map<number, DataRow> {
  const index = new Map<number, DataRow>();
  if (!dataset.columns.includes(ID_COLUMN) || required.some((c) => c === undefined)) {
    return index;
  }

  for (const row of dataset.rows) {
    const id = parseIdentifier(cellOf(row, ID_COLUMN));
    if (id !== undefined && !index.has(id)) index.set(id, row);
  }
  return index;
}

export function consolidateRecords(
  base: BaseRecord[],
  sources: LifecycleSources,
  rules: LedgerRules,
): EnrichedRecord[] {
  const patterns = rules.columnPatterns;

  const vacationColumn = resolveColumn(sources.vacation, patterns.vacationDays);
  const terminationColumn = resolveColumn(sources.termination, patterns.terminationDate);
  const noticeColumn = resolveColumn(sources.termination, patterns.noticeStatus);
  const admissionColumn = resolveColumn(sources.admission, patterns.admissionDate);

  const vacations = indexById(sources.vacation, [vacationColumn]);
  const terminations = indexById(sources.termination, [terminationColumn]);
  const admissions = indexById(sources.admission, [admissionColumn]);

  return base.map((record) => {
    const enriched: EnrichedRecord = { ...record };

    const vacation = vacations.get(record.id);
    if (vacation && vacationColumn) {
      const taken = parseInteger(cellOf(vacation, vacationColumn));
      // negative counts are data-entry noise, not credits
      enriched.vacationDays = taken !== undefined && taken >= 0 ? taken : undefined;
    }

    const termination = terminations.get(record.id);
    if (termination && terminationColumn) {
      enriched.terminationDate = parseCalendarDate(cellOf(termination, terminationColumn));
      enriched.noticeStatus = noticeColumn ? parseText(cellOf(termination, noticeColumn)) : undefined;
    }

    const admission = admissions.get(record.id);
    if (admission && admissionColumn) {
      enriched.admissionDate =
        parseCalendarDate(cellOf(admission, admissionColumn)) ?? record.admissionDate;
    }

    return enriched;
  });
}
