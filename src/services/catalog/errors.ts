import axios from 'axios';
import { z } from 'zod';
import { CatalogRequestError } from '../../utils/errors.js';
import { parseRetryAfter } from '../../utils/retry.js';

/**
 * Classify a failed catalog call. Network errors, timeouts, 429 and 5xx are
 * transient; everything else is not.
 */
export function toCatalogError(operation: string, error: unknown): CatalogRequestError {
  if (error instanceof CatalogRequestError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      // No response: network failure or timeout
      return new CatalogRequestError(operation, error.code ? `${error.code}: ${error.message}` : error.message, {
        transient: true,
        cause: error,
      });
    }

    const header = error.response?.headers['retry-after'];
    return new CatalogRequestError(operation, `HTTP ${status}`, {
      status,
      transient: status === 429 || status >= 500,
      retryAfterMs: parseRetryAfter(typeof header === 'string' ? header : undefined),
      cause: error,
    });
  }

  if (error instanceof z.ZodError) {
    return new CatalogRequestError(operation, `unexpected response shape: ${error.issues[0]?.message ?? 'invalid'}`, {
      transient: false,
      cause: error,
    });
  }

  return new CatalogRequestError(operation, error instanceof Error ? error.message : String(error), {
    transient: false,
    cause: error,
  });
}
