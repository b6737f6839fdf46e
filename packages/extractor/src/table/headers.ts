import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { HeaderStrategy } from '@tablesweep/shared';

export interface HeaderInference {
  headers: string[];
  dataRows: Cheerio<Element>[];
}

type HeaderRule = (rows: Cheerio<Element>[]) => HeaderInference | null;

/**
 * Trimmed text of every cell matching `selector` inside a row, in document order
 */
export function cellTexts(row: Cheerio<Element>, selector: string): string[] {
  const cells = row.find(selector);
  const texts: string[] = [];
  for (let i = 0; i < cells.length; i++) {
    texts.push(cells.eq(i).text().trim());
  }
  return texts;
}

function labelColumns(labels: string[]): string[] {
  return labels.map((label, i) => label || `col_${i + 1}`);
}

function headerRowRule(cellSelector: 'th' | 'td'): HeaderRule {
  return (rows) => {
    const [first, ...rest] = rows;
    if (!first) return null;

    const labels = cellTexts(first, cellSelector);
    if (labels.length === 0) return null;

    return { headers: labelColumns(labels), dataRows: rest };
  };
}

const fromHeaderCells = headerRowRule('th');
const fromFirstDataRow = headerRowRule('td');

const STRATEGY_RULES: Record<HeaderStrategy, HeaderRule[]> = {
  auto: [fromHeaderCells, fromFirstDataRow],
  th: [fromHeaderCells],
  first_row: [fromFirstDataRow],
};

// Synthesized col_1..col_n; every row, the first included, is data
function syntheticHeaders(rows: Cheerio<Element>[]): HeaderInference {
  const first = rows[0];
  const count = Math.max(first ? cellTexts(first, 'td, th').length : 0, 1);
  return {
    headers: Array.from({ length: count }, (_, i) => `col_${i + 1}`),
    dataRows: rows,
  };
}

/**
 * Rows of a table element: every tr descendant in document order
 */
export function tableRows(table: Cheerio<Element>): Cheerio<Element>[] {
  const rows = table.find('tr');
  const result: Cheerio<Element>[] = [];
  for (let i = 0; i < rows.length; i++) {
    result.push(rows.eq(i));
  }
  return result;
}

/**
 * Infer column labels and data rows of a table. Returns null for a table without rows.
 */
export function inferHeaders(table: Cheerio<Element>, strategy: HeaderStrategy): HeaderInference | null {
  const rows = tableRows(table);
  if (rows.length === 0) return null;

  for (const rule of STRATEGY_RULES[strategy]) {
    const inference = rule(rows);
    if (inference) return inference;
  }

  return syntheticHeaders(rows);
}
