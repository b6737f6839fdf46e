import type { ScrapedTable, TableSpec } from '@tablesweep/shared';
import { locateTable } from './locate';
import { inferHeaders } from './headers';
import { normalizeRows } from './rows';

export type TableParseStatus = 'ok' | 'no_table' | 'no_rows';

export interface TableParseResult {
  status: TableParseStatus;
  table: ScrapedTable | null;
}

/**
 * Locate -> infer headers -> normalize rows for one HTML document
 */
export function parseTable(html: string, spec: TableSpec): TableParseResult {
  const element = locateTable(html, spec);
  if (!element) {
    return { status: 'no_table', table: null };
  }

  const inference = inferHeaders(element, spec.headerStrategy);
  if (!inference) {
    return { status: 'no_rows', table: null };
  }

  const rows = normalizeRows(inference.dataRows, inference.headers.length);
  if (rows.length === 0) {
    return { status: 'no_rows', table: null };
  }

  return { status: 'ok', table: { headers: inference.headers, rows } };
}
