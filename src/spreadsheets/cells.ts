import type * as ExcelJS from 'exceljs';
import type { CellValue } from '@core/dataset';

/** Flattens rich text, hyperlinks and formula results to plain values. */
export function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;

  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return typeof value.text === 'string' ? value.text : null;
  if ('error' in value) return null;
  if ('result' in value) return value.result === undefined ? null : toCellValue(value.result);

  return null;
}
