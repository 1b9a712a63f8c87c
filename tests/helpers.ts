import * as ExcelJS from 'exceljs';
import { mkdir } from 'fs/promises';
import path from 'path';
import rulesJson from '../policy-packs/vr-va-br-2025-v1/rules.json';
import { ledgerRulesSchema, type LedgerRules } from '@core/policy-pack';
import { emptyDataset, type CellValue, type Dataset } from '@core/dataset';
import type { LedgerSources } from '@core/engine';
import type { LedgerLogger } from '@core/logger';

export const rules: LedgerRules = ledgerRulesSchema.parse(rulesJson);

export const PACK_DIR = 'policy-packs/vr-va-br-2025-v1';

export function ds(columns: string[], rows: CellValue[][] = []): Dataset {
  return {
    columns,
    rows: rows.map((values) =>
      Object.fromEntries(columns.map((column, i) => [column, values[i] ?? null])),
    ),
  };
}

export function utc(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

export function recordingLogger() {
  const lines: string[] = [];
  const logger: LedgerLogger = {
    info: (tag, message) => lines.push(`[${tag}] ${message}`),
    warn: (tag, message) => lines.push(`[${tag}] WARNING: ${message}`),
    error: (tag, message) => lines.push(`[${tag}] ERROR: ${message}`),
  };
  return { lines, logger };
}

export function fullSources(partial: Partial<LedgerSources>): LedgerSources {
  const pick = (key: keyof LedgerSources): Dataset => partial[key] ?? emptyDataset();
  return {
    roster: pick('roster'),
    vacation: pick('vacation'),
    termination: pick('termination'),
    admission: pick('admission'),
    regionValues: pick('regionValues'),
    workingDays: pick('workingDays'),
    leave: pick('leave'),
    interns: pick('interns'),
    apprentices: pick('apprentices'),
    overseas: pick('overseas'),
  };
}

/** Writes a single-sheet workbook; the first row is the header. */
export async function writeSheet(filePath: string, rows: CellValue[][]): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Planilha1');
  for (const row of rows) sheet.addRow(row);
  await mkdir(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
}
