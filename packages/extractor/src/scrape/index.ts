export { scrapePage, scrapePages, mergeTables, MIN_CONCURRENCY, MAX_CONCURRENCY, DEFAULT_CONCURRENCY } from './pages';
export { mapWithConcurrency } from './pool';
export type { PageScrapeResult, ScrapePagesOptions, ScrapePagesResult } from './pages';
