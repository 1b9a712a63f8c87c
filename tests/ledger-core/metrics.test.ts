import { describe, it, expect } from 'vitest';
import type { LedgerResult, LedgerRow } from '@core/engine';
import { summarizeLedger } from '@core/metrics';

function row(overrides: Partial<LedgerRow>): LedgerRow {
  return {
    id: 1,
    admissionDate: null,
    category: 'SINDPD SP',
    period: { year: 2025, month: 5, day: 1 },
    days: 22,
    dailyValue: 37.5,
    total: 825,
    employerCost: 660,
    employeeDiscount: 165,
    notes: '',
    adjustments: [],
    ...overrides,
  };
}

describe('summarizeLedger', () => {
  const result: LedgerResult = {
    period: { year: 2025, month: 5 },
    rows: [
      row({ id: 1 }),
      row({
        id: 2,
        days: 16,
        dailyValue: 35,
        total: 560,
        employerCost: 448,
        employeeDiscount: 112,
        adjustments: [{ kind: 'vacation', note: 'Férias: -5' }],
      }),
      row({
        id: 3,
        days: 0,
        total: 0,
        employerCost: 0,
        employeeDiscount: 0,
        adjustments: [{ kind: 'termination_zeroed', note: 'Desligado até dia 15 - sem benefício' }],
      }),
    ],
    exclusions: {
      ids: new Set([7, 8]),
      byCategory: { interns: 1, apprentices: 0, leave: 0, overseas: 0, directors: 1 },
    },
    lookupSizes: { daysByGroup: 4, valueByRegion: 4 },
  };

  it('counts rows, exclusions and zero-day rows', () => {
    const summary = summarizeLedger(result);
    expect(summary.period).toBe('2025-05');
    expect(summary.rowCount).toBe(3);
    expect(summary.excludedCount).toBe(2);
    expect(summary.zeroDayCount).toBe(1);
  });

  it('sums the money columns', () => {
    expect(summarizeLedger(result).totals).toEqual({
      total: 1385,
      employerCost: 1108,
      employeeDiscount: 277,
    });
  });

  it('counts adjustments by kind', () => {
    expect(summarizeLedger(result).adjustments).toEqual({
      vacation: 1,
      termination_zeroed: 1,
      termination_prorated: 0,
      admission_prorated: 0,
    });
  });

  it('handles an empty ledger', () => {
    const summary = summarizeLedger({ ...result, rows: [] });
    expect(summary.rowCount).toBe(0);
    expect(summary.totals.total).toBe(0);
  });
});
