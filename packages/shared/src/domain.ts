// Domain types for Tablesweep - paginated HTML table scraping

export type HeaderStrategy = "auto" | "th" | "first_row";
export type OutputFormat = "csv" | "json";

export const HEADER_STRATEGIES: readonly HeaderStrategy[] = ["auto", "th", "first_row"];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["csv", "json"];

export type ErrorCode =
  // Fetch errors
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION"
  | "FETCH_HTTP_3XX" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX";

/**
 * Identifies which table to pull from every page of a request
 */
export interface TableSpec {
  readonly selector: string;
  readonly tableIndex: number;
  readonly headerStrategy: HeaderStrategy;
}

/**
 * Tabular result of one page or of a whole request.
 * Every row holds exactly headers.length cells; columns are positional.
 */
export interface ScrapedTable {
  headers: string[];
  rows: string[][];
}

export type PageStatus = "ok" | "fetch_failed" | "no_table" | "no_rows";

export interface PageOutcome {
  page: number;
  url: string;
  status: PageStatus;
  rows: number;
  errorCode?: ErrorCode | null;
}
