// src/ledger-core/values.ts
// Parse-or-absent extraction for spreadsheet cells. Every parser returns
// `undefined` for input it cannot read; none of them throw.

import { isValid, parse } from 'date-fns';
import type { CellValue } from './dataset';

// ── Calendar dates ───────────────────────────────────────────────────────────

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface TargetPeriod {
  year: number;
  month: number;
}

const DATE_FORMATS = [
  'yyyy-MM-dd',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm:ss',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'dd.MM.yyyy',
];

const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MAX_SERIAL = 2958465; // 9999-12-31

function fromUtc(date: Date): CalendarDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

export function parseCalendarDate(value: CellValue): CalendarDate | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : fromUtc(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 1 || value > MAX_SERIAL) return undefined;
    return fromUtc(new Date(SERIAL_EPOCH_MS + Math.floor(value) * MS_PER_DAY));
  }

  if (typeof value !== 'string') return undefined;

  const text = value.trim();
  if (!text) return undefined;

  for (const format of DATE_FORMATS) {
    const parsed = parse(text, format, new Date(2000, 0, 1));
    if (isValid(parsed)) {
      return {
        year: parsed.getFullYear(),
        month: parsed.getMonth() + 1,
        day: parsed.getDate(),
      };
    }
  }

  return undefined;
}

export function toUtcDate(date: CalendarDate): Date {
  return new Date(Date.UTC(date.year, date.month - 1, date.day));
}

export function isWithinPeriod(date: CalendarDate, period: TargetPeriod): boolean {
  return date.year === period.year && date.month === period.month;
}

export function parsePeriod(text: string): TargetPeriod | undefined {
  const match = /^(\d{4})-(\d{1,2})$/.exec(text.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) return undefined;

  return { year, month };
}

export function formatPeriod(period: TargetPeriod): string {
  return `${period.year}-${String(period.month).padStart(2, '0')}`;
}

export function periodStart(period: TargetPeriod): CalendarDate {
  return { year: period.year, month: period.month, day: 1 };
}

// ── Numbers ──────────────────────────────────────────────────────────────────

/** Integer key shared by every source. Integral values only. */
export function parseIdentifier(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;

  const match = /^([+-]?\d+)(?:\.0+)?$/.exec(value.trim());
  return match ? Number(match[1]) : undefined;
}

/** Whole numbers; numeric cells are truncated toward zero. */
export function parseInteger(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value !== 'string') return undefined;

  const text = value.trim();
  return /^[+-]?\d+$/.test(text) ? Number(text) : undefined;
}

/** Currency amounts in plain (`37.5`) or pt-BR (`R$ 1.234,56`) notation. */
export function parseAmount(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;

  const text = value.trim().replace(/^R\$\s*/i, '');

  if (/^[+-]?\d+(\.\d+)?$/.test(text)) return Number(text);

  if (/^[+-]?\d{1,3}(\.\d{3})*(,\d+)?$/.test(text) || /^[+-]?\d+,\d+$/.test(text)) {
    return Number(text.replace(/\./g, '').replace(',', '.'));
  }

  return undefined;
}

/**
 * Rounds to cents, ties to even on the exact binary value. Only odd
 * multiples of 1/8 can sit exactly halfway between two cents.
 */
export function roundCurrency(value: number): number {
  const cents = value * 100;
  const floor = Math.floor(cents);

  if (Number.isInteger(value * 8) && (value * 8) % 2 !== 0 && cents - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }

  return Number(value.toFixed(2));
}

// ── Text ─────────────────────────────────────────────────────────────────────

export function textOf(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
  }
  return String(value);
}

export function parseText(value: CellValue): string | undefined {
  const text = textOf(value).trim();
  return text ? text : undefined;
}

/** Lower-case, accent-free form used for lenient name matching. */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}
