/**
 * Error Taxonomy - Human-readable descriptions of page fetch failures
 *
 * Failed pages never reach the client; these entries feed server-side log lines.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
}

export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    description: 'The page took too long to respond.',
  },
  FETCH_DNS: {
    title: 'DNS Error',
    description: 'Could not resolve the page domain.',
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    description: 'Could not connect to the page host.',
  },
  FETCH_HTTP_3XX: {
    title: 'Unfollowed Redirect',
    description: 'The page answered with a redirect that was not followed.',
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    description: 'The page returned a 4xx status (missing page or login required).',
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    description: 'The page host returned a 5xx status.',
  },
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, code);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null | undefined): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
  };
}
