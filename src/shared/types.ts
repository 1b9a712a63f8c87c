import type { ADJUSTMENT_KINDS, EXCLUSION_CATEGORIES, OUTPUT_HEADERS, SOURCE_KEYS } from './constants';

export type SourceKey = (typeof SOURCE_KEYS)[number];
export type ExclusionCategory = (typeof EXCLUSION_CATEGORIES)[number];
export type AdjustmentKind = (typeof ADJUSTMENT_KINDS)[number];
export type OutputHeader = (typeof OUTPUT_HEADERS)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface LedgerSummaryRecord {
  period: string;
  rowCount: number;
  excludedCount: number;
  zeroDayCount: number;
  totals: { total: number; employerCost: number; employeeDiscount: number };
  adjustments: Record<AdjustmentKind, number>;
}
