import type { AdjustmentKind, LedgerSummaryRecord } from '@shared/types';
import type { LedgerResult } from './engine';
import { formatPeriod, roundCurrency } from './values';

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

export function summarizeLedger(result: LedgerResult): LedgerSummaryRecord {
  const adjustments: Record<AdjustmentKind, number> = {
    vacation: 0,
    termination_zeroed: 0,
    termination_prorated: 0,
    admission_prorated: 0,
  };

  let total = 0;
  let employerCost = 0;
  let employeeDiscount = 0;
  let zeroDayCount = 0;

  for (const row of result.rows) {
    total += row.total;
    employerCost += row.employerCost;
    employeeDiscount += row.employeeDiscount;

    if (row.days === 0) zeroDayCount += 1;

    for (const adj of row.adjustments) {
      adjustments[adj.kind] += 1;
    }
  }

  return {
    period: formatPeriod(result.period),
    rowCount: result.rows.length,
    excludedCount: result.exclusions.ids.size,
    zeroDayCount,
    totals: {
      total: roundCurrency(total),
      employerCost: roundCurrency(employerCost),
      employeeDiscount: roundCurrency(employeeDiscount),
    },
    adjustments,
  };
}
