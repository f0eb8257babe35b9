import { isAxiosError } from 'axios';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

/**
 * Short, log-friendly reason for a failed request: `HTTP <status>`,
 * `timeout`, or the socket error code.
 */
export function describeRequestError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return 'timeout';
    }
    if (error.code) {
      return error.code;
    }
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return 'timeout';
    }
    return error.message || error.name;
  }

  return String(error);
}
