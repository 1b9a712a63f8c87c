// src/ledger-core/entitlement.ts
// Per-employee payable days and the employer/employee split.
// Pure function: (record, period, tables, rules) -> result.

import type { AdjustmentKind } from '@shared/types';
import type { EnrichedRecord } from './consolidator';
import { lookupDailyValue, lookupEligibleDays, type LookupTables } from './lookups';
import type { LedgerRules } from './policy-pack';
import { isWithinPeriod, roundCurrency, type TargetPeriod } from './values';

export interface Adjustment {
  kind: AdjustmentKind;
  note: string;
}

export interface EntitlementResult {
  baseDays: number;
  days: number;
  dailyValue: number;
  total: number;
  employerCost: number;
  employeeDiscount: number;
  adjustments: Adjustment[];
  notes: string;
}

export function calculateEntitlement(
  record: EnrichedRecord,
  period: TargetPeriod,
  tables: LookupTables,
  rules: LedgerRules,
): EntitlementResult {
  const adjustments: Adjustment[] = [];
  const monthDays = rules.prorationMonthDays;

  // ── Step 1: Base eligible days ────────────────────────────────────────────
  const baseDays = lookupEligibleDays(record.category, tables.daysByGroup, rules);
  let days = baseDays;

  // ── Step 2: Vacation ──────────────────────────────────────────────────────
  if (record.vacationDays !== undefined) {
    days -= record.vacationDays;
    adjustments.push({ kind: 'vacation', note: `Férias: -${record.vacationDays}` });
  }

  // ── Step 3: Termination within the period ─────────────────────────────────
  // Day <= midPeriodDay without the affirmative notice falls through unchanged.
  const termination = record.terminationDate;
  if (termination && isWithinPeriod(termination, period)) {
    const notice = (record.noticeStatus ?? '').trim().toUpperCase();
    const affirmative = notice === rules.affirmativeNoticeMarker.toUpperCase();

    if (termination.day <= rules.midPeriodDay && affirmative) {
      days = 0;
      adjustments.push({
        kind: 'termination_zeroed',
        note: `Desligado até dia ${rules.midPeriodDay} - sem benefício`,
      });
    } else if (termination.day > rules.midPeriodDay) {
      const prorated = Math.trunc(baseDays * (termination.day / monthDays));
      days = Math.min(days, prorated);
      adjustments.push({
        kind: 'termination_prorated',
        note: `Desligado dia ${termination.day} - proporcional`,
      });
    }
  }

  // ── Step 4: Admission within the period ───────────────────────────────────
  // Prorates from baseDays, not from the running value.
  const admission = record.admissionDate;
  if (admission && isWithinPeriod(admission, period)) {
    const prorated = Math.trunc(baseDays * ((monthDays - (admission.day - 1)) / monthDays));
    days = Math.min(days, Math.max(0, prorated));
    adjustments.push({
      kind: 'admission_prorated',
      note: `Admissão dia ${admission.day} - proporcional`,
    });
  }

  // ── Step 5: Clamp ─────────────────────────────────────────────────────────
  days = Math.max(0, Math.trunc(days));

  // ── Step 6: Value and split ──────────────────────────────────────────────
  const dailyValue = lookupDailyValue(record.category, tables.valueByRegion, rules);
  const total = roundCurrency(days * dailyValue);
  const employerCost = roundCurrency(total * rules.costSplit.employerRate);
  const employeeDiscount = roundCurrency(total * rules.costSplit.employeeRate);

  return {
    baseDays,
    days,
    dailyValue,
    total,
    employerCost,
    employeeDiscount,
    adjustments,
    notes: adjustments.map((a) => a.note).join(rules.observationDelimiter),
  };
}
