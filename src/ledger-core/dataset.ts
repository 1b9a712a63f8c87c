// src/ledger-core/dataset.ts
// Rectangular tabular data as delivered by the source loader.

export type CellValue = string | number | boolean | Date | null;

export type DataRow = Record<string, CellValue>;

export interface Dataset {
  columns: string[];
  rows: DataRow[];
}

export function emptyDataset(): Dataset {
  return { columns: [], rows: [] };
}

export function isEmptyDataset(dataset: Dataset): boolean {
  return dataset.columns.length === 0 || dataset.rows.length === 0;
}

export function cellOf(row: DataRow, column: string): CellValue {
  return row[column] ?? null;
}

export function columnAt(dataset: Dataset, position: number): string | undefined {
  return dataset.columns[position];
}

/** Returns a copy of the dataset with `from` renamed to `to`. */
export function renameColumn(dataset: Dataset, from: string, to: string): Dataset {
  if (from === to || !dataset.columns.includes(from)) return dataset;

  return {
    columns: dataset.columns.map((c) => (c === from ? to : c)),
    rows: dataset.rows.map((row) => {
      const { [from]: value, ...rest } = row;
      return { ...rest, [to]: value ?? null };
    }),
  };
}

export function mapColumn(
  dataset: Dataset,
  column: string,
  fn: (value: CellValue) => CellValue,
): Dataset {
  if (!dataset.columns.includes(column)) return dataset;

  return {
    columns: [...dataset.columns],
    rows: dataset.rows.map((row) => ({ ...row, [column]: fn(cellOf(row, column)) })),
  };
}
