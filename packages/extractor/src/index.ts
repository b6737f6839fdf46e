// @tablesweep/extractor - page fetching, table extraction and page aggregation

export * from './fetcher';
export * from './pagination';
export * from './table';
export * from './scrape';
export { ExtractorLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
