import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { cellTexts } from './headers';

/**
 * Fit a row to `columnCount` cells: pad with empty strings or truncate.
 * An empty row yields null.
 */
export function normalizeRow(cells: string[], columnCount: number): string[] | null {
  if (cells.length === 0) return null;

  if (cells.length < columnCount) {
    return [...cells, ...Array.from({ length: columnCount - cells.length }, () => '')];
  }

  return cells.slice(0, columnCount);
}

/**
 * Cell text of each data row (td and th cells), fitted to the header count
 */
export function normalizeRows(dataRows: Cheerio<Element>[], columnCount: number): string[][] {
  const out: string[][] = [];
  for (const row of dataRows) {
    const normalized = normalizeRow(cellTexts(row, 'td, th'), columnCount);
    if (normalized) out.push(normalized);
  }
  return out;
}
