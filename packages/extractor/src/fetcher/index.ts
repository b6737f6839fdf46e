// Fetcher exports
export { fetchHttp, fetchPage, fetchPageResult, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './http';
export type { FetchResult, FetchOptions, PageFetchOptions } from './types';
