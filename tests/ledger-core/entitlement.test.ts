import { describe, it, expect } from 'vitest';
import type { EnrichedRecord } from '@core/consolidator';
import { calculateEntitlement } from '@core/entitlement';
import type { LookupTables } from '@core/lookups';
import { rules } from '../helpers';

const period = { year: 2025, month: 5 };
const noTables: LookupTables = { daysByGroup: new Map(), valueByRegion: new Map() };

function record(overrides: Partial<EnrichedRecord> = {}): EnrichedRecord {
  return { id: 1, category: 'SINDPD RJ', ...overrides };
}

describe('calculateEntitlement', () => {
  it('pays full base days for a São Paulo employee admitted earlier', () => {
    const result = calculateEntitlement(
      record({
        category: 'SINDICATO SÃO PAULO',
        admissionDate: { year: 2025, month: 4, day: 10 },
      }),
      period,
      noTables,
      rules,
    );

    expect(result).toEqual({
      baseDays: 22,
      days: 22,
      dailyValue: 37.5,
      total: 825,
      employerCost: 660,
      employeeDiscount: 165,
      adjustments: [],
      notes: '',
    });
  });

  it('uses table days and values when present', () => {
    const tables: LookupTables = {
      daysByGroup: new Map([['SINDPD SP', 20]]),
      valueByRegion: new Map([['São Paulo', 40]]),
    };
    const result = calculateEntitlement(record({ category: 'SINDPD SP' }), period, tables, rules);
    expect(result.days).toBe(20);
    expect(result.total).toBe(800);
  });

  it('deducts vacation days', () => {
    const result = calculateEntitlement(record({ vacationDays: 10 }), period, noTables, rules);
    expect(result.days).toBe(12);
    expect(result.notes).toBe('Férias: -10');
  });

  it('prorates a termination after mid-period without notice', () => {
    const result = calculateEntitlement(
      record({ terminationDate: { year: 2025, month: 5, day: 20 }, noticeStatus: 'PENDENTE' }),
      period,
      noTables,
      rules,
    );

    // floor(22 * 20 / 30) = 14
    expect(result.days).toBe(14);
    expect(result.dailyValue).toBe(35);
    expect(result.total).toBe(490);
    expect(result.employerCost).toBe(392);
    expect(result.employeeDiscount).toBe(98);
    expect(result.notes).toBe('Desligado dia 20 - proporcional');
  });

  it('zeroes days for a notified termination up to mid-period', () => {
    const result = calculateEntitlement(
      record({ terminationDate: { year: 2025, month: 5, day: 10 }, noticeStatus: ' ok ' }),
      period,
      noTables,
      rules,
    );

    expect(result.days).toBe(0);
    expect(result.total).toBe(0);
    expect(result.adjustments).toEqual([
      { kind: 'termination_zeroed', note: 'Desligado até dia 15 - sem benefício' },
    ]);
  });

  it('leaves an early termination without notice unadjusted', () => {
    const result = calculateEntitlement(
      record({ terminationDate: { year: 2025, month: 5, day: 10 }, noticeStatus: 'PENDENTE' }),
      period,
      noTables,
      rules,
    );
    expect(result.days).toBe(22);
    expect(result.adjustments).toEqual([]);
  });

  it('ignores terminations outside the period', () => {
    const result = calculateEntitlement(
      record({ terminationDate: { year: 2025, month: 4, day: 10 }, noticeStatus: 'OK' }),
      period,
      noTables,
      rules,
    );
    expect(result.days).toBe(22);
  });

  it('keeps the smaller of vacation and termination results', () => {
    const result = calculateEntitlement(
      record({ vacationDays: 5, terminationDate: { year: 2025, month: 5, day: 25 } }),
      period,
      noTables,
      rules,
    );

    // 22 - 5 = 17; floor(22 * 25 / 30) = 18
    expect(result.days).toBe(17);
    expect(result.notes).toBe('Férias: -5; Desligado dia 25 - proporcional');
  });

  it('does not reduce days for an admission on the first', () => {
    const result = calculateEntitlement(
      record({ admissionDate: { year: 2025, month: 5, day: 1 } }),
      period,
      noTables,
      rules,
    );
    expect(result.days).toBe(22);
    expect(result.notes).toBe('Admissão dia 1 - proporcional');
  });

  it('prorates admission from base days, not the running value', () => {
    const admitted = { admissionDate: { year: 2025, month: 5, day: 16 } };

    expect(calculateEntitlement(record(admitted), period, noTables, rules).days).toBe(11);
    // 22 - 15 = 7 stays below floor(22 * 15 / 30) = 11
    expect(
      calculateEntitlement(record({ ...admitted, vacationDays: 15 }), period, noTables, rules).days,
    ).toBe(7);
  });

  it('clamps to zero', () => {
    expect(calculateEntitlement(record({ vacationDays: 30 }), period, noTables, rules).days).toBe(0);
    expect(
      calculateEntitlement(
        record({ admissionDate: { year: 2025, month: 5, day: 31 } }),
        period,
        noTables,
        rules,
      ).days,
    ).toBe(0);
  });

  it('applies an injected cost split', () => {
    const custom = { ...rules, costSplit: { employerRate: 0.5, employeeRate: 0.5 } };
    const result = calculateEntitlement(record(), period, noTables, custom);
    expect(result.total).toBe(770);
    expect(result.employerCost).toBe(385);
    expect(result.employeeDiscount).toBe(385);
  });
});
