import type { PageOutcome, ScrapedTable, TableSpec } from '@tablesweep/shared';
import { fetchPageResult } from '../fetcher/http';
import type { PageFetchOptions } from '../fetcher/types';
import { buildPageUrl } from '../pagination/url-template';
import { parseTable } from '../table/parse';
import { normalizeRow } from '../table/rows';
import { scrapeLogger } from '../utils/logger';
import { mapWithConcurrency } from './pool';

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 32;
export const DEFAULT_CONCURRENCY = 10;

export interface PageScrapeResult {
  table: ScrapedTable | null;
  outcome: PageOutcome;
}

export interface ScrapePagesOptions {
  template: string;
  pages: number[];
  spec: TableSpec;
  concurrency?: number;
  fetch?: PageFetchOptions;
}

export interface ScrapePagesResult {
  /** Merged table, null when no page produced data */
  table: ScrapedTable | null;
  /** One entry per page, in completion order */
  pages: PageOutcome[];
}

/**
 * Fetch one page and extract its table. Never throws: a failed fetch and a
 * missing table both yield `table: null`.
 */
export async function scrapePage(
  page: number,
  url: string,
  spec: TableSpec,
  fetchOptions: PageFetchOptions = {},
): Promise<PageScrapeResult> {
  const fetched = await fetchPageResult(url, fetchOptions);

  if (!fetched.success || fetched.html === null) {
    return {
      table: null,
      outcome: { page, url, status: 'fetch_failed', rows: 0, errorCode: fetched.errorCode },
    };
  }

  const parsed = parseTable(fetched.html, spec);
  if (parsed.status !== 'ok' || !parsed.table) {
    scrapeLogger.debug(`Page ${page} (${url}) yielded no data: ${parsed.status}`);
    return {
      table: null,
      outcome: { page, url, status: parsed.status === 'ok' ? 'no_rows' : parsed.status, rows: 0 },
    };
  }

  return {
    table: parsed.table,
    outcome: { page, url, status: 'ok', rows: parsed.table.rows.length },
  };
}

/**
 * Count skipped pages by reason: the fetch error code, or the extraction status.
 * e.g. "FETCH_HTTP_5XX x2, no_table x1"
 */
export function summarizeSkipped(outcomes: PageOutcome[]): string {
  const counts = new Map<string, number>();
  for (const outcome of outcomes) {
    if (outcome.status === 'ok') continue;
    const reason = outcome.errorCode ?? outcome.status;
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return [...counts.entries()].map(([reason, count]) => `${reason} x${count}`).join(', ');
}

function clampConcurrency(concurrency: number): number {
  if (!Number.isFinite(concurrency)) return DEFAULT_CONCURRENCY;
  return Math.min(MAX_CONCURRENCY, Math.max(MIN_CONCURRENCY, Math.floor(concurrency)));
}

/**
 * Stack page tables in the given order. Headers come from the first table;
 * later rows are fitted to its column count by position.
 */
export function mergeTables(tables: ScrapedTable[]): ScrapedTable | null {
  const [first] = tables;
  if (!first) return null;

  const columnCount = first.headers.length;
  const rows: string[][] = [];
  for (const table of tables) {
    for (const row of table.rows) {
      const fitted = normalizeRow(row, columnCount);
      if (fitted) rows.push(fitted);
    }
  }

  return rows.length > 0 ? { headers: [...first.headers], rows } : null;
}

/**
 * Scrape every page of a template with bounded concurrency and merge the results.
 * Rows are stacked in page completion order; each page keeps its own row order.
 */
export async function scrapePages(options: ScrapePagesOptions): Promise<ScrapePagesResult> {
  const { template, pages, spec, fetch = {} } = options;
  const concurrency = clampConcurrency(options.concurrency ?? DEFAULT_CONCURRENCY);

  const results = await mapWithConcurrency(pages, concurrency, (page) =>
    scrapePage(page, buildPageUrl(template, page), spec, fetch),
  );

  const tables: ScrapedTable[] = [];
  for (const result of results) {
    if (result.table && result.table.rows.length > 0) {
      tables.push(result.table);
    }
  }

  const outcomes = results.map((result) => result.outcome);
  const failed = outcomes.filter((outcome) => outcome.status !== 'ok').length;
  const reasons = failed > 0 ? ` (${summarizeSkipped(outcomes)})` : '';
  scrapeLogger.info(
    `Scraped ${pages.length} page(s) from ${template}: ${pages.length - failed} with data, ${failed} skipped${reasons}`,
  );

  return { table: mergeTables(tables), pages: outcomes };
}
