// src/spreadsheets/loader.ts
// Named tabular sources from xlsx files. A missing or unreadable file
// yields an empty dataset; business meaning is attached later.

import * as ExcelJS from 'exceljs';
import { stat } from 'fs/promises';
import path from 'path';
import { SOURCE_KEYS } from '@shared/constants';
import { emptyDataset, type DataRow, type Dataset } from '@core/dataset';
import type { LedgerSources } from '@core/engine';
import { consoleLogger, type LedgerLogger } from '@core/logger';
import type { SourcesConfig } from '@core/policy-pack';
import { textOf } from '@core/values';
import { toCellValue } from './cells';

export function worksheetToDataset(sheet: ExcelJS.Worksheet): Dataset {
  const width = sheet.columnCount;
  if (width === 0 || sheet.rowCount === 0) return emptyDataset();

  const header = sheet.getRow(1);
  const seen = new Map<string, number>();
  const columns: string[] = [];

  for (let c = 1; c <= width; c++) {
    const base = textOf(toCellValue(header.getCell(c).value)).trim() || `Unnamed: ${c - 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    columns.push(count > 0 ? `${base}.${count}` : base);
  }

  const rows: DataRow[] = [];
  for (let r = 2; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const record: DataRow = {};
    let blank = true;

    columns.forEach((column, i) => {
      const value = toCellValue(row.getCell(i + 1).value);
      if (value !== null) blank = false;
      record[column] = value;
    });

    if (!blank) rows.push(record);
  }

  return { columns, rows };
}

/** First worksheet of the workbook at `filePath`. */
export async function readDataset(filePath: string): Promise<Dataset> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  const [sheet] = workbook.worksheets;
  return sheet ? worksheetToDataset(sheet) : emptyDataset();
}

export async function findSourceFile(
  name: string,
  dataDir: string,
  searchFolders: readonly string[],
): Promise<string | undefined> {
  for (const folder of searchFolders) {
    const candidate = path.resolve(dataDir, folder, name);
    const info = await stat(candidate).catch(() => undefined);
    if (info?.isFile()) return candidate;
  }
  return undefined;
}

export async function loadDataset(
  name: string,
  dataDir: string,
  searchFolders: readonly string[],
  logger: LedgerLogger = consoleLogger,
): Promise<Dataset> {
  const filePath = await findSourceFile(name, dataDir, searchFolders);
  if (!filePath) {
    logger.warn('SOURCES', `File not found: ${name}`);
    return emptyDataset();
  }

  try {
    return await readDataset(filePath);
  } catch (err) {
    logger.error('SOURCES', `Failed to read ${path.basename(filePath)}:`, err);
    return emptyDataset();
  }
}

export async function loadLedgerSources(
  dataDir: string,
  sources: SourcesConfig,
  logger: LedgerLogger = consoleLogger,
): Promise<LedgerSources> {
  const loaded = await Promise.all(
    SOURCE_KEYS.map(async (key) => {
      const dataset = await loadDataset(sources.files[key], dataDir, sources.searchFolders, logger);
      return [key, dataset] as const;
    }),
  );

  const result: Partial<LedgerSources> = {};
  for (const [key, dataset] of loaded) result[key] = dataset;

  return {
    roster: result.roster ?? emptyDataset(),
    vacation: result.vacation ?? emptyDataset(),
    termination: result.termination ?? emptyDataset(),
    admission: result.admission ?? emptyDataset(),
    regionValues: result.regionValues ?? emptyDataset(),
    workingDays: result.workingDays ?? emptyDataset(),
    leave: result.leave ?? emptyDataset(),
    interns: result.interns ?? emptyDataset(),
    apprentices: result.apprentices ?? emptyDataset(),
    overseas: result.overseas ?? emptyDataset(),
  };
}
