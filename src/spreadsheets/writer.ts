// src/spreadsheets/writer.ts
// The ledger artifact: one worksheet, fixed header order.

import * as ExcelJS from 'exceljs';
import { format } from 'date-fns';
import { mkdir } from 'fs/promises';
import path from 'path';
import { OUTPUT_HEADERS, OUTPUT_SHEET_NAME } from '@shared/constants';
import type { OutputHeader } from '@shared/types';
import type { LedgerResult, LedgerRow } from '@core/engine';
import { toUtcDate } from '@core/values';

export type OutputRecord = Record<OutputHeader, string | number | Date | null>;

const DATE_FORMAT = 'dd/mm/yyyy';
const MONEY_FORMAT = '#,##0.00';

const COLUMN_STYLES: Partial<Record<OutputHeader, { width: number; numFmt?: string }>> = {
  Matricula: { width: 12 },
  'Admissão': { width: 12, numFmt: DATE_FORMAT },
  'Sindicato do Colaborador': { width: 48 },
  'Competência': { width: 12, numFmt: DATE_FORMAT },
  'VALOR DIÁRIO VR': { width: 16, numFmt: MONEY_FORMAT },
  TOTAL: { width: 12, numFmt: MONEY_FORMAT },
  'Custo empresa': { width: 14, numFmt: MONEY_FORMAT },
  'Desconto profissional': { width: 20, numFmt: MONEY_FORMAT },
  'OBS GERAL': { width: 60 },
};

export function toOutputRecord(row: LedgerRow): OutputRecord {
  return {
    Matricula: row.id,
    'Admissão': row.admissionDate ? toUtcDate(row.admissionDate) : null,
    'Sindicato do Colaborador': row.category,
    'Competência': toUtcDate(row.period),
    Dias: row.days,
    'VALOR DIÁRIO VR': row.dailyValue,
    TOTAL: row.total,
    'Custo empresa': row.employerCost,
    'Desconto profissional': row.employeeDiscount,
    'OBS GERAL': row.notes,
  };
}

export function buildLedgerWorkbook(result: LedgerResult): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(OUTPUT_SHEET_NAME);

  sheet.columns = OUTPUT_HEADERS.map((header) => {
    const style = COLUMN_STYLES[header];
    return {
      header,
      key: header,
      width: style?.width ?? 10,
      style: style?.numFmt ? { numFmt: style.numFmt } : {},
    };
  });

  for (const row of result.rows) {
    sheet.addRow(toOutputRecord(row));
  }

  return workbook;
}

export function defaultOutputName(now: Date = new Date()): string {
  return `VR_FINAL_${format(now, 'yyyyMMdd_HHmmss')}.xlsx`;
}

/** Writes the workbook and returns the absolute path written. */
export async function writeLedgerFile(result: LedgerResult, filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  await mkdir(path.dirname(target), { recursive: true });
  await buildLedgerWorkbook(result).xlsx.writeFile(target);
  return target;
}
