// HTTP fetcher using undici
import { fetch } from 'undici';
import type { ErrorCode } from '@tablesweep/shared';
import { getErrorInfo } from '@tablesweep/shared';
import type { FetchResult, FetchOptions, PageFetchOptions } from './types';
import { httpLogger } from '../utils/logger';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_TIMEOUT = 20000;

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

const TIMEOUT_ERROR_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Read a string `code` from an error or its cause (undici wraps socket errors in "fetch failed")
 */
function systemErrorCode(error: unknown): string | null {
  for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
    if (candidate && typeof candidate === 'object' && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code;
    }
  }
  return null;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * AbortSignal.timeout rejects with a DOMException, which is not an Error instance in every realm
 */
function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

function classifyError(error: unknown, timeout: number): { errorCode: ErrorCode; errorDetail: string } {
  const code = systemErrorCode(error);

  if (isAbortError(error) || (code !== null && TIMEOUT_ERROR_CODES.has(code))) {
    return { errorCode: 'FETCH_TIMEOUT', errorDetail: `Request timeout after ${timeout}ms` };
  }

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return { errorCode: 'FETCH_DNS', errorDetail: `DNS lookup failed: ${errorMessage(error)}` };
  }

  if (code !== null && NETWORK_ERROR_CODES.has(code)) {
    return { errorCode: 'FETCH_CONNECTION', errorDetail: `Connection failed: ${code} - ${errorMessage(error)}` };
  }

  return { errorCode: 'FETCH_CONNECTION', errorDetail: `Fetch failed: ${errorMessage(error)}` };
}

function statusErrorCode(status: number): ErrorCode {
  if (status >= 500) return 'FETCH_HTTP_5XX';
  if (status >= 400) return 'FETCH_HTTP_4XX';
  return 'FETCH_HTTP_3XX';
}

/**
 * Fetch a URL using undici with error classification and timing capture.
 * Never throws: every failure is reported through errorCode/errorDetail.
 */
export async function fetchHttp(options: FetchOptions): Promise<FetchResult> {
  const startTime = Date.now();
  const {
    url,
    timeout = DEFAULT_TIMEOUT,
    userAgent = DEFAULT_USER_AGENT,
    headers = {},
    followRedirects = true,
  } = options;

  const result: FetchResult = {
    success: false,
    url,
    httpStatus: null,
    html: null,
    errorCode: null,
    errorDetail: null,
    timings: {
      total: 0,
    },
  };

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': userAgent,
        ...headers,
      },
      redirect: followRedirects ? 'follow' : 'manual',
      signal: AbortSignal.timeout(timeout),
    });

    result.httpStatus = response.status;

    // Body is read even on error statuses so the timeout also bounds it
    const body = await response.text();
    result.timings.total = Date.now() - startTime;

    if (!response.ok) {
      result.errorCode = statusErrorCode(response.status);
      result.errorDetail = `HTTP ${response.status}`;
      return result;
    }

    result.html = body;
    result.success = true;
    return result;
  } catch (error: unknown) {
    result.timings.total = Date.now() - startTime;
    const { errorCode, errorDetail } = classifyError(error, timeout);
    result.errorCode = errorCode;
    result.errorDetail = errorDetail;
    return result;
  }
}

/**
 * Fetch one page, logging a failure at debug level with its taxonomy entry
 */
export async function fetchPageResult(url: string, options: PageFetchOptions = {}): Promise<FetchResult> {
  const result = await fetchHttp({ ...options, url });

  if (!result.success) {
    const info = getErrorInfo(result.errorCode);
    const reason = info ? `${info.title}: ${info.description}` : 'Unknown Error';
    httpLogger.debug(`${url} skipped: ${reason} (${result.errorDetail ?? 'no detail'})`);
  }

  return result;
}

/**
 * Fetch a page body; null on any network error, non-2xx status or timeout
 */
export async function fetchPage(url: string, options: PageFetchOptions = {}): Promise<string | null> {
  const result = await fetchPageResult(url, options);
  return result.success ? result.html : null;
}
