// HTTP fetcher types
import type { ErrorCode } from '@tablesweep/shared';

export interface FetchResult {
  success: boolean;
  url: string;
  httpStatus: number | null;
  html: string | null;
  errorCode: ErrorCode | null;
  errorDetail: string | null;
  timings: {
    total: number;
  };
}

export interface FetchOptions {
  url: string;
  timeout?: number;  // default 20000ms, covers headers and body
  userAgent?: string;
  headers?: Record<string, string>;
  followRedirects?: boolean;  // default true
}

/** Per-request fetch settings shared by every page of a scrape */
export type PageFetchOptions = Omit<FetchOptions, 'url'>;
