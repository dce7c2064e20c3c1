import { httpStatusOf } from '../../utils/index.js';

const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'ENETUNREACH', 'ECONNRESET'];

/**
 * Network failures, 5xx, 408, 429 and rate-limited 403s are worth another attempt.
 */
export function isRetryableApiError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (NETWORK_ERROR_CODES.some((code) => error.message.includes(code))) {
    return true;
  }

  const status = httpStatusOf(error);
  if (status === undefined) {
    return false;
  }

  if (status === 403) {
    return /rate limit/i.test(error.message);
  }

  return status >= 500 || status === 429 || status === 408;
}

export function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}
