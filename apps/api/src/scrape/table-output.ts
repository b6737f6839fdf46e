import { stringify } from 'csv-stringify/sync';
import type { ScrapedTable } from '@tablesweep/shared';

export const CSV_FILENAME = 'scraped_table.csv';

/**
 * Header line plus one line per row. Fields are quoted only when they hold a
 * comma, quote or line break; every line ends with \n.
 */
export function toCsv(table: ScrapedTable): string {
  return stringify([table.headers, ...table.rows], {
    record_delimiter: 'unix',
  });
}

/**
 * One object per row keyed by header. A repeated header keeps its last column's value.
 */
export function toRecords(table: ScrapedTable): Record<string, string>[] {
  return table.rows.map(row =>
    Object.fromEntries(table.headers.map((header, i) => [header, row[i] ?? ''])),
  );
}
